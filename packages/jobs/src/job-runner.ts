/**
 * Job Runner
 *
 * Drains the ledger's pending queue one job at a time, sleeping a fixed
 * cooldown after every job so the similarity service is not flooded.
 */

import type { Logger, ServiceOptions } from '@simbatch/core';
import type { JobLedger } from './job-ledger';
import type { JobExecution, RunSummary } from './types';

export interface JobRunnerConfig {
  /** Pause after each job, whether it ran, failed or was skipped */
  cooldownMs: number;
}

export class JobRunner {
  private stopRequested = false;
  private running = false;
  private cooldownMs: number;

  constructor(
    private ledger: JobLedger,
    private executor: JobExecution,
    config: JobRunnerConfig,
    private logger: Logger
  ) {
    this.cooldownMs = config.cooldownMs;
  }

  /**
   * Run until the queue is empty or a stop is requested
   *
   * Failed jobs stay pending in the ledger and are picked up again by the
   * next resumed run.
   */
  async run(options: ServiceOptions): Promise<RunSummary> {
    if (this.running) {
      throw new Error('Runner is already running');
    }
    this.running = true;
    this.stopRequested = false;

    const summary: RunSummary = { executed: 0, succeeded: 0, failed: 0, skipped: 0, stopped: false };
    this.logger.info('Runner started', { ...this.ledger.getStats() });

    try {
      for (;;) {
        if (this.stopRequested) {
          summary.stopped = true;
          break;
        }

        const job = await this.ledger.pollNextPendingJob();
        if (!job) break;

        if (this.ledger.isDone(job.identifier)) {
          summary.skipped++;
          this.logger.debug('Skipping finished job', { jobId: job.identifier });
        } else {
          summary.executed++;
          this.logger.info('Running job', { jobId: job.identifier, inputFiles: job.inputFiles.length });

          const outcome = await this.executor.execute(job, options);
          if (outcome.succeeded) {
            await this.ledger.markDone(job.identifier);
            summary.succeeded++;
          } else {
            summary.failed++;
            this.logger.error('Job failed', { jobId: job.identifier, error: outcome.error.message });
            await this.clearAfterFailure(job.identifier, () => this.executor.clear(job));
          }
        }

        await this.sleep(this.cooldownMs);
      }
    } finally {
      this.running = false;
    }

    if (summary.stopped) {
      this.logger.warn('Runner stopped before the queue was empty', { ...summary });
    } else {
      this.logger.info('All jobs are done', { ...summary });
    }
    return summary;
  }

  /**
   * Ask the runner to stop before its next job
   */
  stop(): void {
    this.logger.info('Stop requested');
    this.stopRequested = true;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async clearAfterFailure(jobId: string, clear: () => Promise<void>): Promise<void> {
    try {
      await clear();
    } catch (error) {
      this.logger.warn('Could not clear output of failed job', {
        jobId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Sleep utility
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
