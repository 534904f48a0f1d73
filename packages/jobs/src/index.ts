/**
 * @simbatch/jobs
 *
 * Durable job ledger and queue runner for batches of similarity checks
 *
 * Provides:
 * - JobLedger: JSON ledger of jobs and their done flags, with the pending queue
 * - JobRunner: drains the queue with a cooldown between jobs
 * - JobExecutor: submits one job and saves its report
 * - buildJobs: plans the jobs of a run from groups and file patterns
 */

// Ledger
export { JobLedger, LEDGER_FILE, type JobLedgerConfig, type OpenLedgerOptions } from './job-ledger';

// Runner
export { JobRunner, type JobRunnerConfig } from './job-runner';

// Executor
export { JobExecutor, SUMMARY_FILE, REPORT_DIR, type JobExecutorConfig } from './job-executor';

// Factory
export { buildJobs, planChunks, reportPathFor, type FileDiscovery, type JobPlan } from './job-factory';

// Errors
export { JobDescriptorError, LedgerIntegrityError } from './errors';

// Types
export { createJobDescriptor, displayName, DEFAULT_LANGUAGE } from './types';
export type {
  JobDescriptor,
  JobDescriptorFields,
  JobExecution,
  JobOutcome,
  JobProgressEvent,
  LedgerEntry,
  LedgerStats,
  RunSummary,
} from './types';
