/**
 * Job Types
 *
 * A job is one submission to the similarity service: a set of input files
 * (optionally with baseline files) whose report lands in its own directory.
 */

import { isJobId, type JobId, type ServiceOptions } from '@simbatch/core';
import { JobDescriptorError } from './errors';

export const DEFAULT_LANGUAGE = 'c';

/**
 * Immutable description of one comparison job
 */
export interface JobDescriptor {
  readonly identifier: JobId;
  /** Destination directory for this job's report; unique per job */
  readonly reportPath: string;
  readonly inputFiles: readonly string[];
  readonly baselineFiles: readonly string[];
  readonly language: string;
  /** Stripped from the start of each input path to form its display name */
  readonly displayPrefix: string;
}

export interface JobDescriptorFields {
  identifier: string;
  reportPath: string;
  inputFiles: readonly string[];
  baselineFiles?: readonly string[];
  language?: string;
  displayPrefix?: string;
}

/**
 * Validate and freeze a job descriptor, filling in defaults
 *
 * @throws JobDescriptorError when the identifier is not a safe path segment,
 * the report path is empty or there are no input files
 */
export function createJobDescriptor(fields: JobDescriptorFields): JobDescriptor {
  const { identifier } = fields;
  if (!isJobId(identifier)) {
    throw new JobDescriptorError(`Invalid job identifier: ${JSON.stringify(identifier)}`);
  }
  if (fields.reportPath === '') {
    throw new JobDescriptorError(`Job ${identifier} has no report path`);
  }
  if (fields.inputFiles.length === 0) {
    throw new JobDescriptorError(`Job ${identifier} has no input files`);
  }

  return Object.freeze({
    identifier,
    reportPath: fields.reportPath,
    inputFiles: Object.freeze([...fields.inputFiles]),
    baselineFiles: Object.freeze([...(fields.baselineFiles ?? [])]),
    language: fields.language ?? DEFAULT_LANGUAGE,
    displayPrefix: fields.displayPrefix ?? '',
  });
}

/**
 * Name shown for `file` in the report
 */
export function displayName(job: Pick<JobDescriptor, 'displayPrefix'>, file: string): string {
  const { displayPrefix } = job;
  if (displayPrefix !== '' && file.startsWith(displayPrefix)) {
    return file.slice(displayPrefix.length);
  }
  return file;
}

/**
 * Result of executing one job. Never persisted.
 */
export type JobOutcome =
  | { succeeded: true }
  | { succeeded: false; error: Error };

export interface LedgerEntry {
  done: boolean;
  job: JobDescriptor;
}

export interface LedgerStats {
  total: number;
  done: number;
  pending: number;
}

export interface RunSummary {
  executed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** True when the run ended on a stop request rather than an empty queue */
  stopped: boolean;
}

/**
 * Progress reported while a job executes
 */
export type JobProgressEvent =
  | { type: 'upload'; identifier: JobId; displayName: string; index: number; total: number }
  | { type: 'submitted'; identifier: JobId; resultUrl: string }
  | { type: 'download'; identifier: JobId; path: string; fetched: number };

/**
 * What the runner needs from an executor
 */
export interface JobExecution {
  /** Resolves with the outcome; never rejects */
  execute(job: JobDescriptor, options: ServiceOptions): Promise<JobOutcome>;
  /** Remove whatever the job left at its report path */
  clear(job: JobDescriptor): Promise<void>;
}
