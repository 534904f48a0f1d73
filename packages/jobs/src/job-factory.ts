/**
 * Job Factory
 *
 * Plans the comparison jobs of a fresh run. For every file pattern and every
 * current group there is one job comparing the group with itself, and for
 * every previous group one or more jobs comparing the current group with a
 * chunk of the previous group's files. Chunks keep each submission under
 * the service's file limit.
 */

import * as path from 'path';
import { slugify } from '@simbatch/core';
import { createJobDescriptor, type JobDescriptor } from './types';

export interface JobPlan {
  outputDir: string;
  language: string;
  filePatterns: readonly string[];
  currentGroups: readonly string[];
  previousGroups: readonly string[];
  baselineFiles: readonly string[];
  /** Stripped from input paths for display, usually the files directory */
  displayPrefix: string;
  /** Most files sent in one submission */
  maxBatchFiles: number;
  /** Smallest chunk worth submitting on its own */
  minChunkFiles: number;
}

/**
 * Where the input files of a group come from
 */
export interface FileDiscovery {
  findInputFiles(group: string, pattern: string): Promise<string[]>;
}

/**
 * Split `total` previous-group files into chunk sizes
 *
 * Chunks hold at most `remaining` files, the room left in a submission after
 * the current group's files. When nothing is left, `floor` files per chunk
 * are sent anyway so every previous file is still compared. Sizes are spread
 * evenly and differ by at most one.
 */
export function planChunks(total: number, remaining: number, floor: number): number[] {
  if (total <= 0) return [];

  const capacity = remaining > 0 ? remaining : Math.max(floor, 1);
  const count = Math.ceil(total / capacity);
  const size = Math.floor(total / count);
  const larger = total % count;

  return Array.from({ length: count }, (_, i) => (i < larger ? size + 1 : size));
}

function chunk<T>(items: readonly T[], sizes: readonly number[]): T[][] {
  const chunks: T[][] = [];
  let start = 0;
  for (const size of sizes) {
    chunks.push(items.slice(start, start + size));
    start += size;
  }
  return chunks;
}

export function reportPathFor(outputDir: string, identifier: string): string {
  return path.join(outputDir, `${identifier}_reports`);
}

/**
 * Build every job of a run, in submission order
 *
 * Identifiers are slugs of pattern and group names. When two names slug to the
 * same identifier, the later job gets a `_2`, `_3`, ... suffix.
 */
export async function buildJobs(plan: JobPlan, discovery: FileDiscovery): Promise<JobDescriptor[]> {
  const jobs: JobDescriptor[] = [];
  const used = new Set<string>();

  const uniqueIdentifier = (base: string): string => {
    let identifier = base;
    for (let n = 2; used.has(identifier); n++) {
      identifier = `${base}_${n}`;
    }
    used.add(identifier);
    return identifier;
  };

  const makeJob = (slug: string, inputFiles: readonly string[]): JobDescriptor => {
    const identifier = uniqueIdentifier(slug);
    return createJobDescriptor({
      identifier,
      reportPath: reportPathFor(plan.outputDir, identifier),
      inputFiles,
      baselineFiles: plan.baselineFiles,
      language: plan.language,
      displayPrefix: plan.displayPrefix,
    });
  };

  for (const pattern of plan.filePatterns) {
    for (const group of plan.currentGroups) {
      const currentFiles = await discovery.findInputFiles(group, pattern);
      if (currentFiles.length === 0) continue;

      const selfId = slugify(`${pattern}_${group}`);
      jobs.push(makeJob(selfId, currentFiles));

      const remaining = plan.maxBatchFiles - currentFiles.length;
      for (const previous of plan.previousGroups) {
        const previousFiles = await discovery.findInputFiles(previous, pattern);
        const sizes = planChunks(previousFiles.length, remaining, plan.minChunkFiles);

        chunk(previousFiles, sizes).forEach((files, i) => {
          const identifier = slugify(`${pattern}_${group}_vs_${previous}_part${i}`);
          jobs.push(makeJob(identifier, [...currentFiles, ...files]));
        });
      }
    }
  }

  return jobs;
}
