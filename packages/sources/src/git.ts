/**
 * Git cloning through the git executable
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import type { Logger } from '@simbatch/core';

/**
 * Runs one git command; rejects when it exits non-zero
 */
export type GitRunner = (args: string[]) => Promise<void>;

export const runGit: GitRunner = (args) =>
  new Promise((resolve, reject) => {
    const child = spawn('git', args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`git ${args[0] ?? ''} exited with code ${code ?? 'null'}: ${stderr.trim()}`));
      }
    });
  });

export type CloneResult = 'exists' | 'cloned' | 'cloned-default-branch' | 'failed';

export interface CloneOptions {
  /** Branch to check out; the remote default is used when it is missing or unset */
  branch?: string;
  logger: Logger;
  git?: GitRunner;
}

/**
 * Clone `url` into `targetPath` unless something is already there.
 *
 * A failed clone is logged and reported as 'failed'; it never throws, so one
 * unreachable repository does not stop a group clone.
 */
export async function cloneRepository(url: string, targetPath: string, options: CloneOptions): Promise<CloneResult> {
  const { branch, logger, git = runGit } = options;

  if (fs.existsSync(targetPath)) {
    logger.debug('Repository already present', { targetPath });
    return 'exists';
  }

  if (branch) {
    try {
      await git(['clone', '--branch', branch, url, targetPath]);
      return 'cloned';
    } catch (error) {
      logger.debug('Branch clone failed, trying the default branch', {
        url,
        branch,
        error: error instanceof Error ? error.message : String(error),
      });
      await fs.promises.rm(targetPath, { recursive: true, force: true });
    }
  }

  try {
    await git(['clone', url, targetPath]);
    return branch ? 'cloned-default-branch' : 'cloned';
  } catch (error) {
    logger.warn('Could not clone repository, skipping', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    await fs.promises.rm(targetPath, { recursive: true, force: true });
    return 'failed';
  }
}
