/**
 * @simbatch/similarity
 *
 * Client for the MOSS code-similarity service:
 * - MossClient: socket submission plus report download
 * - ReportDownloader: fetches result pages over HTTP
 */

export { MossClient, DEFAULT_MOSS_HOST, DEFAULT_MOSS_PORT, toWireName, type MossClientConfig } from './moss-client';
export {
  ReportDownloader,
  collectMatchPages,
  collectFrames,
  rewriteLinks,
  type ReportDownloaderConfig,
} from './report-downloader';
export { SimilarityServiceError } from './similarity-error';
export { SUPPORTED_LANGUAGES, isSupportedLanguage, type Language } from './languages';
export { mapWithConcurrency } from './concurrency';
export type {
  SimilarityService,
  SubmissionRequest,
  SubmissionFile,
  UploadProgress,
  ReportArtifact,
  FullReportOptions,
} from './types';
