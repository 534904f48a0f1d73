import type { LogLevel } from '../logger';

/**
 * Similarity service submission options
 *
 * - m: maximum number of times a passage may appear before it is ignored
 * - d: 1 when files are grouped by directory
 * - x: 1 to use the experimental server
 * - c: free-text comment shown on the report
 * - n: number of matching file pairs shown in the report
 */
export interface ServiceOptions {
  m: number;
  d: number;
  x: number;
  c: string;
  n: number;
}

export const DEFAULT_SERVICE_OPTIONS: Readonly<ServiceOptions> = Object.freeze({
  m: 20,
  d: 0,
  x: 0,
  c: '',
  n: 1000,
});

/**
 * Batch configuration file, as written in YAML (after schema defaults)
 */
export interface BatchConfigFile {
  lang: string;
  output: string;
  files: string;
  moss_request_cooldown: number;
  base_repos: string[];
  base_files: string[];
  gitlab_group: string;
  this_quarter_groups: string[] | null;
  previous_quarter_groups: string[] | null;
  assignment_branch: string;
  assignment_path: string;
  assignment_files: string[];
  max_batch_files: number;
  min_chunk_files: number;
  download_connections: number;
  moss_options: Partial<ServiceOptions>;
  log_level?: LogLevel;
}

/**
 * Resolved batch configuration used by the rest of the system.
 * Directory paths are absolute.
 */
export interface BatchConfig {
  language: string;
  outputDir: string;
  filesDir: string;
  cooldownSeconds: number;
  baseRepos: string[];
  baseFilePatterns: string[];
  gitlabGroup: string;
  currentGroups: string[];
  previousGroups: string[];
  branch: string;
  assignmentPath: string;
  filePatterns: string[];
  maxBatchFiles: number;
  minChunkFiles: number;
  downloadConnections: number;
  serviceOptions: ServiceOptions;
  logLevel?: LogLevel;
}
