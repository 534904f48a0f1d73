/**
 * Job Executor
 *
 * Runs one job against the similarity service: submit, save the summary
 * page, mirror the full report. Every failure is returned as an outcome so
 * the runner can carry on with the next job.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger, ServiceOptions } from '@simbatch/core';
import type { SimilarityService } from '@simbatch/similarity';
import { displayName, type JobDescriptor, type JobExecution, type JobOutcome, type JobProgressEvent } from './types';

export const SUMMARY_FILE = 'report.html';
export const REPORT_DIR = 'report';

export interface JobExecutorConfig {
  /** Report pages fetched at once (default: 8) */
  downloadConnections?: number;
  onProgress?: (event: JobProgressEvent) => void;
}

export class JobExecutor implements JobExecution {
  private downloadConnections: number;
  private onProgress?: (event: JobProgressEvent) => void;

  constructor(
    private service: SimilarityService,
    config: JobExecutorConfig,
    private logger: Logger
  ) {
    this.downloadConnections = config.downloadConnections ?? 8;
    this.onProgress = config.onProgress;
  }

  async execute(job: JobDescriptor, options: ServiceOptions): Promise<JobOutcome> {
    try {
      await this.executeJob(job, options);
      return { succeeded: true };
    } catch (error) {
      return { succeeded: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  async clear(job: JobDescriptor): Promise<void> {
    await fs.rm(job.reportPath, { recursive: true, force: true });
  }

  private async executeJob(job: JobDescriptor, options: ServiceOptions): Promise<void> {
    const { identifier } = job;

    // Anything left from an interrupted attempt is stale
    await this.clear(job);

    const resultUrl = await this.service.submit(
      {
        language: job.language,
        baselineFiles: job.baselineFiles,
        inputFiles: job.inputFiles.map(file => ({ path: file, displayName: displayName(job, file) })),
        options,
      },
      (progress) => {
        this.onProgress?.({
          type: 'upload',
          identifier,
          displayName: progress.displayName,
          index: progress.index,
          total: progress.total,
        });
      }
    );

    this.logger.info('Report URL received', { jobId: identifier, resultUrl });
    this.onProgress?.({ type: 'submitted', identifier, resultUrl });

    await fs.mkdir(job.reportPath, { recursive: true });
    const summary = await this.service.fetchSummary(resultUrl);
    await fs.writeFile(path.join(job.reportPath, SUMMARY_FILE), summary, 'utf-8');

    const artifacts = await this.service.fetchFullReport(resultUrl, {
      concurrency: this.downloadConnections,
      onArtifact: (artifact, fetched) => {
        this.onProgress?.({ type: 'download', identifier, path: artifact.path, fetched });
      },
    });

    const reportDir = path.resolve(job.reportPath, REPORT_DIR);
    await fs.mkdir(reportDir, { recursive: true });
    for (const artifact of artifacts) {
      const target = path.resolve(reportDir, artifact.path);
      if (path.dirname(target) !== reportDir) {
        throw new Error(`Report page outside the report directory: ${artifact.path}`);
      }
      await fs.writeFile(target, artifact.content, 'utf-8');
    }

    this.logger.debug('Report saved', { jobId: identifier, pages: artifacts.length });
  }
}
