/**
 * Cloning a course's groups and base repositories
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '@simbatch/core';
import type { GitLabGroup, GitLabProject } from './gitlab-client';
import { cloneRepository, type CloneResult, type GitRunner } from './git';

/**
 * The part of GitLabClient used for cloning
 */
export interface GroupDirectory {
  listGroups(names: readonly string[]): Promise<GitLabGroup[]>;
  listProjects(groupId: number): Promise<GitLabProject[]>;
}

export interface CloneSummary {
  cloned: number;
  existing: number;
  failed: number;
}

export interface GroupCloneOptions {
  branch?: string;
  logger: Logger;
  git?: GitRunner;
  onProject?: (group: string, project: string, result: CloneResult) => void;
}

function tally(summary: CloneSummary, result: CloneResult): void {
  if (result === 'exists') summary.existing++;
  else if (result === 'failed') summary.failed++;
  else summary.cloned++;
}

/**
 * Clone every project of every named group into `<filesDir>/<group>/<project>`
 *
 * A group whose projects cannot be listed is skipped and counted once in
 * `failed`.
 */
export async function cloneGroups(
  directory: GroupDirectory,
  groupNames: readonly string[],
  filesDir: string,
  options: GroupCloneOptions
): Promise<CloneSummary> {
  const { logger } = options;
  const summary: CloneSummary = { cloned: 0, existing: 0, failed: 0 };

  for (const group of await directory.listGroups(groupNames)) {
    let projects: GitLabProject[];
    try {
      projects = await directory.listProjects(group.id);
    } catch (error) {
      logger.warn('Could not list projects, skipping group', {
        group: group.name,
        error: error instanceof Error ? error.message : String(error),
      });
      summary.failed++;
      continue;
    }

    const groupPath = path.join(filesDir, group.name);
    await fs.promises.mkdir(groupPath, { recursive: true });
    logger.info('Cloning group', { group: group.name, projects: projects.length });

    for (const project of projects) {
      const result = await cloneRepository(project.ssh_url_to_repo, path.join(groupPath, project.name), {
        branch: options.branch,
        logger,
        git: options.git,
      });
      tally(summary, result);
      options.onProject?.(group.name, project.name, result);
    }
  }

  return summary;
}

/**
 * Clone `repos[i]` into `<outputDir>/base/base_<i>` on its default branch
 */
export async function cloneBaseRepositories(
  repos: readonly string[],
  outputDir: string,
  options: { logger: Logger; git?: GitRunner }
): Promise<CloneSummary> {
  const summary: CloneSummary = { cloned: 0, existing: 0, failed: 0 };
  const baseDir = baseDirectory(outputDir);
  await fs.promises.mkdir(baseDir, { recursive: true });

  for (const [i, repo] of repos.entries()) {
    tally(summary, await cloneRepository(repo, path.join(baseDir, `base_${i}`), options));
  }
  return summary;
}

export function baseDirectory(outputDir: string): string {
  return path.join(outputDir, 'base');
}
