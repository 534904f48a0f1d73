/**
 * Status Command
 *
 * Prints the ledger of an output directory: every job with its done flag.
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { z } from 'zod';
import { createLogger, loadBatchConfig } from '@simbatch/core';
import { JobLedger } from '@simbatch/jobs';
import { BASE_ALIASES, BASE_ARGS } from '../core/command-definition';
import { defineCommand } from '../core/command-loader';
import { printInfo, printWarning } from '../core/io/cli-logger';

export const StatusOptionsSchema = z.object({
  config: z.string({ required_error: '--config is required' }).min(1),
  output: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type StatusOptions = z.output<typeof StatusOptionsSchema>;

export async function showStatus(options: StatusOptions): Promise<number> {
  const config = loadBatchConfig(options.config, { output: options.output });
  const storagePath = JobLedger.pathFor(config.outputDir);

  if (!fs.existsSync(storagePath)) {
    printWarning(`No ledger found at ${storagePath}`);
    return 1;
  }

  const logger = createLogger({ level: options.verbose ? 'debug' : config.logLevel });
  const ledger = new JobLedger({ storagePath }, logger.child({ component: 'job-ledger' }));
  await ledger.loadFrom(storagePath);

  for (const { done, job } of ledger.listEntries()) {
    const state = done ? chalk.green('done   ') : chalk.yellow('pending');
    console.log(`  ${state} ${job.identifier} (${job.inputFiles.length} files)`);
  }

  const stats = ledger.getStats();
  printInfo(`${stats.done} of ${stats.total} job(s) done, ${stats.pending} pending`);
  return 0;
}

export const statusCommand = defineCommand({
  name: 'status',
  description: 'Show the jobs recorded for an output directory',
  schema: StatusOptionsSchema,
  argSpec: {
    args: {
      '--config': { type: 'string', description: 'YAML batch configuration', required: true },
      '--output': { type: 'string', description: 'Output directory (overrides the config file)' },
      ...BASE_ARGS,
    },
    aliases: {
      '-c': '--config',
      '-o': '--output',
      ...BASE_ALIASES,
    },
  },
  examples: ['simbatch status -c course.yaml'],
  handler: showStatus,
});
