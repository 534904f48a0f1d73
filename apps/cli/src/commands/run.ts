/**
 * Run Command
 *
 * Clones the configured groups and/or runs the comparison jobs. A fresh
 * comparison plans every job and records it in the ledger before the first
 * submission; `--resume` continues from the ledger instead.
 */

import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  ConfigurationError,
  createLogger,
  loadBatchConfig,
  type BatchConfig,
  type Logger,
} from '@simbatch/core';
import {
  JobExecutor,
  JobLedger,
  JobRunner,
  buildJobs,
  type FileDiscovery,
  type JobProgressEvent,
  type RunSummary,
} from '@simbatch/jobs';
import { MossClient, type SimilarityService } from '@simbatch/similarity';
import {
  GitLabClient,
  baseDirectory,
  cloneBaseRepositories,
  cloneGroups,
  filterInputFiles,
  findBaseFiles,
  findGroupFiles,
  type GitRunner,
  type GroupDirectory,
} from '@simbatch/sources';
import { BASE_ALIASES, BASE_ARGS } from '../core/command-definition';
import { defineCommand } from '../core/command-loader';
import { printInfo, printProgress, printSuccess, printWarning } from '../core/io/cli-logger';

export const RunOptionsSchema = z
  .object({
    config: z.string({ required_error: '--config is required' }).min(1),
    output: z.string().optional(),
    clone: z.boolean().default(false),
    compare: z.boolean().default(false),
    resume: z.boolean().default(false),
    logFile: z.string().optional(),
    verbose: z.boolean().default(false),
  })
  .refine(options => options.clone || options.compare, {
    message: 'Nothing to do: pass --clone, --compare or both',
  })
  .refine(options => !options.resume || options.compare, {
    message: '--resume only applies together with --compare',
    path: ['resume'],
  });

export type RunOptions = z.output<typeof RunOptionsSchema>;

/**
 * Collaborators the command builds from credentials; replaced in tests
 */
export interface RunDependencies {
  env: NodeJS.ProcessEnv;
  /** Dotenv file supplying credentials missing from `env` */
  envFile?: string;
  createSimilarityService(userId: string, logger: Logger): SimilarityService;
  createGroupDirectory(url: string, token: string, logger: Logger): GroupDirectory;
  git?: GitRunner;
  /** Calls `stop` on an operator interrupt; returns a function removing the hook */
  onInterrupt?(stop: () => void): () => void;
}

export const defaultRunDependencies: RunDependencies = {
  env: process.env,
  envFile: '.env',
  createSimilarityService: (userId, logger) => new MossClient({ userId }, logger),
  createGroupDirectory: (url, token, logger) => new GitLabClient({ url, token }, logger),
  onInterrupt: (stop) => {
    process.once('SIGINT', stop);
    return () => {
      process.off('SIGINT', stop);
    };
  },
};

/**
 * `env` with the variables of a dotenv file added underneath; variables
 * already set keep their values. A missing file adds nothing.
 */
export async function withEnvFile(env: NodeJS.ProcessEnv, envFile: string | undefined): Promise<NodeJS.ProcessEnv> {
  if (!envFile) return env;

  let content: string;
  try {
    content = await fs.promises.readFile(envFile, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return env;
    }
    throw new ConfigurationError(
      `Could not read ${envFile}`,
      envFile,
      'Fix its permissions or export the credentials instead',
      error instanceof Error ? error : undefined
    );
  }

  return { ...dotenv.parse(content), ...env };
}

interface Credentials {
  mossUserId?: string;
  gitlab?: { url: string; token: string };
}

/**
 * Read the credentials a run needs, failing before any work starts
 */
function readCredentials(options: RunOptions, env: NodeJS.ProcessEnv): Credentials {
  const credentials: Credentials = {};

  if (options.clone) {
    const url = env.GITLAB_URL;
    const token = env.GITLAB_TOKEN;
    if (!url || !token) {
      throw new ConfigurationError(
        'GitLab credentials are not set',
        'environment',
        'Export GITLAB_URL and GITLAB_TOKEN, or run without --clone'
      );
    }
    credentials.gitlab = { url, token };
  }

  if (options.compare) {
    const userId = env.MOSS_USER_ID || env.USER_ID;
    if (!userId) {
      throw new ConfigurationError(
        'MOSS user id is not set',
        'environment',
        'Export MOSS_USER_ID with the id from your MOSS registration mail'
      );
    }
    credentials.mossUserId = userId;
  }

  return credentials;
}

async function cloneSources(
  config: BatchConfig,
  gitlab: { url: string; token: string },
  options: RunOptions,
  deps: RunDependencies,
  logger: Logger
): Promise<void> {
  const directory = deps.createGroupDirectory(gitlab.url, gitlab.token, logger.child({ component: 'gitlab' }));
  const groups = [...config.currentGroups, ...config.previousGroups];

  printInfo(`Cloning ${groups.length} group(s) into ${config.filesDir}`);
  const summary = await cloneGroups(directory, groups, config.filesDir, {
    branch: config.branch,
    logger: logger.child({ component: 'clone' }),
    git: deps.git,
    onProject: (group, project, result) => {
      if (options.verbose || result === 'failed') {
        printProgress(`${group}/${project}: ${result}`);
      }
    },
  });
  printSuccess(`Cloned ${summary.cloned} repositories (${summary.existing} already present, ${summary.failed} failed)`);

  if (config.baseRepos.length > 0) {
    const base = await cloneBaseRepositories(config.baseRepos, config.outputDir, {
      logger: logger.child({ component: 'clone' }),
      git: deps.git,
    });
    printSuccess(`Cloned ${base.cloned} base repositories (${base.existing} already present, ${base.failed} failed)`);
  }
}

async function planJobs(config: BatchConfig, ledger: JobLedger, logger: Logger): Promise<void> {
  const baselineFiles = await findBaseFiles(baseDirectory(config.outputDir), config.baseFilePatterns);

  const discovery: FileDiscovery = {
    findInputFiles: async (group, pattern) => {
      const files = await findGroupFiles(path.join(config.filesDir, group), pattern, config.assignmentPath);
      return filterInputFiles(files, config.language, logger);
    },
  };

  const jobs = await buildJobs(
    {
      outputDir: config.outputDir,
      language: config.language,
      filePatterns: config.filePatterns,
      currentGroups: config.currentGroups,
      previousGroups: config.previousGroups,
      baselineFiles,
      displayPrefix: `${config.filesDir}${path.sep}`,
      maxBatchFiles: config.maxBatchFiles,
      minChunkFiles: config.minChunkFiles,
    },
    discovery
  );

  for (const job of jobs) {
    await ledger.addJob(job);
  }
  printInfo(`Planned ${jobs.length} job(s) with ${baselineFiles.length} base file(s)`);
}

function createProgressPrinter(verbose: boolean): (event: JobProgressEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'upload':
        if (verbose || event.index === event.total) {
          printProgress(`[${event.identifier}] uploaded ${event.index}/${event.total} ${event.displayName}`);
        }
        break;
      case 'submitted':
        printInfo(`[${event.identifier}] report: ${event.resultUrl}`);
        break;
      case 'download':
        if (verbose) {
          printProgress(`[${event.identifier}] fetched ${event.fetched}: ${event.path}`);
        }
        break;
    }
  };
}

/**
 * Execute a run; resolves with the process exit code
 */
export async function runBatch(options: RunOptions, deps: RunDependencies = defaultRunDependencies): Promise<number> {
  const config = loadBatchConfig(options.config, { output: options.output });
  const credentials = readCredentials(options, await withEnvFile(deps.env, deps.envFile));
  const logger = createLogger({ level: options.verbose ? 'debug' : config.logLevel, logFile: options.logFile });

  await fs.promises.mkdir(config.outputDir, { recursive: true });
  await fs.promises.mkdir(config.filesDir, { recursive: true });

  if (credentials.gitlab) {
    await cloneSources(config, credentials.gitlab, options, deps, logger);
  }

  if (!credentials.mossUserId) {
    return 0;
  }

  const ledger = await JobLedger.open(
    { outputDir: config.outputDir, resume: options.resume },
    logger.child({ component: 'job-ledger' })
  );

  if (options.resume) {
    const stats = ledger.getStats();
    printInfo(`Resuming: ${stats.done} of ${stats.total} job(s) already done`);
  } else {
    await planJobs(config, ledger, logger);
  }

  const service = deps.createSimilarityService(credentials.mossUserId, logger.child({ component: 'similarity' }));
  const executor = new JobExecutor(
    service,
    { downloadConnections: config.downloadConnections, onProgress: createProgressPrinter(options.verbose) },
    logger.child({ component: 'job-executor' })
  );
  const runner = new JobRunner(
    ledger,
    executor,
    { cooldownMs: config.cooldownSeconds * 1000 },
    logger.child({ component: 'job-runner' })
  );

  const removeInterruptHook = deps.onInterrupt?.(() => {
    printWarning('Stopping after the current job; run again with --resume to continue');
    runner.stop();
  });

  let summary: RunSummary;
  try {
    summary = await runner.run(config.serviceOptions);
  } finally {
    removeInterruptHook?.();
  }

  if (summary.stopped) {
    printWarning(`Stopped after ${summary.executed} job(s); ${summary.failed} failed`);
    return 1;
  }
  if (summary.failed > 0) {
    printWarning(`${summary.failed} of ${summary.executed} job(s) failed; run again with --resume to retry them`);
    return 1;
  }
  printSuccess(`All jobs are done (${summary.succeeded} run, ${summary.skipped} already done)`);
  return 0;
}

export const runCommand = defineCommand({
  name: 'run',
  description: 'Clone submissions and/or run the comparison jobs',
  schema: RunOptionsSchema,
  argSpec: {
    args: {
      '--config': { type: 'string', description: 'YAML batch configuration', required: true },
      '--output': { type: 'string', description: 'Output directory (overrides the config file)' },
      '--clone': { type: 'boolean', description: 'Clone the configured GitLab groups', default: false },
      '--compare': { type: 'boolean', description: 'Submit the comparison jobs', default: false },
      '--resume': { type: 'boolean', description: 'Continue from the existing ledger', default: false },
      '--log-file': { type: 'string', description: 'Also write logs to this file' },
      ...BASE_ARGS,
    },
    aliases: {
      '-c': '--config',
      '-o': '--output',
      ...BASE_ALIASES,
    },
  },
  examples: [
    'simbatch run -c course.yaml --clone --compare',
    'simbatch run -c course.yaml --compare --resume',
  ],
  handler: (options) => runBatch(options),
});
