/**
 * Job Ledger
 *
 * Durable record of every job and whether it is done, kept in one JSON file
 * keyed by job identifier. The pending queue is derived from it and lives in
 * memory only.
 *
 * Every mutation rewrites the whole file through a temporary file and a
 * rename, so a process killed mid-write leaves the previous ledger intact.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { JobId, Logger } from '@simbatch/core';
import { JobDescriptorError, LedgerIntegrityError } from './errors';
import { createJobDescriptor, type JobDescriptor, type LedgerEntry, type LedgerStats } from './types';

export const LEDGER_FILE = 'state.json';

const PersistedJobSchema = z.object({
  identifier: z.string(),
  reportPath: z.string(),
  inputFiles: z.array(z.string()),
  baselineFiles: z.array(z.string()).optional(),
  language: z.string().optional(),
  displayPrefix: z.string().optional(),
});

const LedgerFileSchema = z.record(
  z.string(),
  z.object({
    done: z.boolean(),
    job: PersistedJobSchema,
  })
);

export interface JobLedgerConfig {
  storagePath: string;
}

export interface OpenLedgerOptions {
  outputDir: string;
  /** Load the existing ledger; otherwise start from an empty one */
  resume: boolean;
}

export class JobLedger {
  private storagePath: string;
  private logger: Logger;
  // Insertion order of the map is the order jobs are queued and persisted
  private entries = new Map<JobId, LedgerEntry>();
  private pendingQueue: JobDescriptor[] = [];

  constructor(config: JobLedgerConfig, logger: Logger) {
    this.storagePath = config.storagePath;
    this.logger = logger;
  }

  /**
   * Open the ledger of an output directory
   *
   * A fresh run deletes any ledger left there; a resumed run loads it.
   */
  static async open(options: OpenLedgerOptions, logger: Logger): Promise<JobLedger> {
    const storagePath = JobLedger.pathFor(options.outputDir);
    const ledger = new JobLedger({ storagePath }, logger);

    if (options.resume) {
      await ledger.loadFrom(storagePath);
    } else {
      await fs.rm(storagePath, { force: true });
      await fs.rm(`${storagePath}.tmp`, { force: true });
      logger.debug('Started a fresh ledger', { storagePath });
    }
    return ledger;
  }

  static pathFor(outputDir: string): string {
    return path.join(outputDir, LEDGER_FILE);
  }

  getStoragePath(): string {
    return this.storagePath;
  }

  /**
   * Record a new job and queue it
   *
   * @throws LedgerIntegrityError if the identifier is already recorded
   */
  async addJob(job: JobDescriptor): Promise<void> {
    if (this.entries.has(job.identifier)) {
      throw new LedgerIntegrityError(`Duplicate job identifier: ${job.identifier}`);
    }

    this.entries.set(job.identifier, { done: false, job });
    this.pendingQueue.push(job);
    await this.persist();

    this.logger.debug('Job added', { jobId: job.identifier, inputFiles: job.inputFiles.length });
  }

  /**
   * @throws LedgerIntegrityError if the job is unknown or already done
   */
  async markDone(identifier: JobId): Promise<void> {
    const entry = this.entries.get(identifier);
    if (!entry) {
      throw new LedgerIntegrityError(`Unknown job: ${identifier}`);
    }
    if (entry.done) {
      throw new LedgerIntegrityError(`Job already done: ${identifier}`);
    }

    entry.done = true;
    await this.persist();

    this.logger.info('Job done', { jobId: identifier });
  }

  isDone(identifier: JobId): boolean {
    return this.entries.get(identifier)?.done ?? false;
  }

  /**
   * Next queued job (FIFO), or null when the queue is empty
   */
  async pollNextPendingJob(): Promise<JobDescriptor | null> {
    return this.pendingQueue.shift() ?? null;
  }

  /**
   * Replace the ledger's contents with the file at `storagePath`, which
   * also becomes the file written by later mutations
   *
   * Every recorded job is queued again, done or not, in file order; the
   * runner skips the done ones. A missing file leaves the ledger empty.
   *
   * @throws LedgerIntegrityError if the file cannot be parsed or validated
   */
  async loadFrom(storagePath: string): Promise<void> {
    this.storagePath = storagePath;

    let content: string;
    try {
      content = await fs.readFile(storagePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.entries = new Map();
        this.pendingQueue = [];
        this.logger.info('No ledger to resume from, starting empty', { storagePath });
        return;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new LedgerIntegrityError(
        `Ledger file is not valid JSON: ${storagePath}`,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = LedgerFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
      throw new LedgerIntegrityError(`Malformed ledger file ${storagePath}: ${where}: ${issue?.message ?? 'invalid'}`);
    }

    const entries = new Map<JobId, LedgerEntry>();
    for (const [key, record] of Object.entries(parsed.data)) {
      if (key !== record.job.identifier) {
        throw new LedgerIntegrityError(
          `Malformed ledger file ${storagePath}: key ${key} holds job ${record.job.identifier}`
        );
      }

      let job: JobDescriptor;
      try {
        job = createJobDescriptor(record.job);
      } catch (error) {
        if (error instanceof JobDescriptorError) {
          throw new LedgerIntegrityError(`Malformed ledger file ${storagePath}: ${error.message}`, error);
        }
        throw error;
      }
      entries.set(job.identifier, { done: record.done, job });
    }

    this.entries = entries;
    this.pendingQueue = [...entries.values()].map(entry => entry.job);

    const stats = this.getStats();
    this.logger.info('Ledger loaded', { storagePath, total: stats.total, done: stats.done });
  }

  /**
   * Write the whole ledger atomically
   */
  async persist(): Promise<void> {
    // fromEntries defines own properties, so every identifier becomes a plain key
    const data = Object.fromEntries(
      [...this.entries].map(([identifier, entry]) => [identifier, { done: entry.done, job: entry.job }])
    );

    const tempPath = `${this.storagePath}.tmp`;
    await fs.mkdir(path.dirname(this.storagePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, this.storagePath);
  }

  getStats(): LedgerStats {
    let done = 0;
    for (const entry of this.entries.values()) {
      if (entry.done) done++;
    }
    return { total: this.entries.size, done, pending: this.entries.size - done };
  }

  /**
   * Every entry, in insertion order
   */
  listEntries(): LedgerEntry[] {
    return [...this.entries.values()].map(entry => ({ done: entry.done, job: entry.job }));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
