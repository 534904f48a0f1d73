/**
 * Similarity service collaborator types
 */

import type { ServiceOptions } from '@simbatch/core';

/**
 * A file to upload, with the name shown in the report
 */
export interface SubmissionFile {
  path: string;
  displayName: string;
}

export interface SubmissionRequest {
  language: string;
  /** Uploaded as base files; matches against them are not reported */
  baselineFiles: readonly string[];
  inputFiles: readonly SubmissionFile[];
  options: ServiceOptions;
}

/**
 * Emitted after each file has been written to the service
 */
export interface UploadProgress {
  path: string;
  displayName: string;
  /** 1-based position across baseline and input files */
  index: number;
  total: number;
}

/**
 * One page of a downloaded report, relative to the report directory
 */
export interface ReportArtifact {
  path: string;
  content: string;
}

export interface FullReportOptions {
  /** Maximum number of pages fetched at once */
  concurrency: number;
  onArtifact?: (artifact: ReportArtifact, fetched: number) => void;
}

export interface SimilarityService {
  /**
   * Upload the files and wait for the result URL
   */
  submit(request: SubmissionRequest, onUpload?: (progress: UploadProgress) => void): Promise<string>;

  /**
   * Fetch the result index page
   */
  fetchSummary(resultUrl: string): Promise<string>;

  /**
   * Fetch the index and every match page reachable from it
   */
  fetchFullReport(resultUrl: string, options: FullReportOptions): Promise<ReportArtifact[]>;
}
