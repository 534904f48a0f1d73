/**
 * Submission file discovery
 *
 * Layout on disk is `<filesDir>/<group>/<project>/<assignment path>/...`.
 * Patterns are matched one directory level below the group (each project):
 * with an empty assignment path, a pattern for `<dir>/<file>.c` finds
 * `<project>/<dir>/<file>.c`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { Logger } from '@simbatch/core';

const COMMENT_CHECKED_LANGUAGES = new Set(['c', 'cc']);

function toGlobPattern(...segments: string[]): string {
  return path.join(...segments).split(path.sep).join('/');
}

/**
 * Files matching `<groupDir>/<any project>/<subPath>/<pattern>`, sorted and absolute
 */
export async function findGroupFiles(groupDir: string, pattern: string, subPath = ''): Promise<string[]> {
  const matches = await glob(toGlobPattern(groupDir, '*', subPath, pattern), { nodir: true, absolute: true });
  return matches.sort();
}

/**
 * Non-empty files matching any of `patterns` one level below `baseDir`
 */
export async function findBaseFiles(baseDir: string, patterns: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  for (const pattern of patterns) {
    const matches = await glob(toGlobPattern(baseDir, '*', pattern), { nodir: true, absolute: true });
    for (const file of matches.sort()) {
      if (!found.includes(file) && (await fileSize(file)) > 0) {
        found.push(file);
      }
    }
  }
  return found;
}

/**
 * Keep files worth submitting: non-empty and, for C-family languages, with
 * something left after comments are removed
 */
export async function filterInputFiles(files: readonly string[], language: string, logger?: Logger): Promise<string[]> {
  const kept: string[] = [];
  for (const file of files) {
    if ((await fileSize(file)) === 0) continue;
    if (COMMENT_CHECKED_LANGUAGES.has(language)) {
      let content: string;
      try {
        content = await fs.promises.readFile(file, 'utf-8');
      } catch (error) {
        // Unreadable files are submitted and left to the service to judge
        logger?.debug('Could not read file for content check', {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
        kept.push(file);
        continue;
      }
      if (!hasCode(content)) continue;
    }
    kept.push(file);
  }
  return kept;
}

async function fileSize(file: string): Promise<number> {
  const stat = await fs.promises.stat(file);
  return stat.size;
}

/**
 * Source text without whole-line `//` comments and block comments. String
 * and character literals are kept intact.
 */
export function stripComments(source: string): string {
  return source
    .split('\n')
    .filter(line => !line.trim().startsWith('//'))
    .join('\n')
    .replace(
      /("(?:\\.|[^"\\\n])*"|'(?:\\.|[^'\\\n])*')|\/\*[\s\S]*?\*\//g,
      (_match: string, literal: string | undefined) => literal ?? ' '
    );
}

export function hasCode(source: string): boolean {
  return /[\p{L}\p{N}]/u.test(stripComments(source));
}
