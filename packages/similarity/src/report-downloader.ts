/**
 * Report Downloader
 *
 * Fetches a result page and, for a full report, every match page and frame
 * reachable from it. Absolute links into the result are rewritten to relative
 * ones so the saved copy browses offline.
 *
 * Uses ky for HTTP requests with built-in retry and timeout.
 */

import ky, { type KyInstance } from 'ky';
import type { Logger } from '@simbatch/core';
import { mapWithConcurrency } from './concurrency';
import { SimilarityServiceError } from './similarity-error';
import type { FullReportOptions, ReportArtifact } from './types';

export interface ReportDownloaderConfig {
  timeout?: number;
  retry?: number;
}

const HREF_PATTERN = /href\s*=\s*"([^"]+)"/gi;
const FRAME_SRC_PATTERN = /<frame\b[^>]*\bsrc\s*=\s*"([^"]+)"/gi;
const MATCH_PAGE_PATTERN = /^match\d+\.html$/;

export class ReportDownloader {
  private http: KyInstance;

  constructor(config: ReportDownloaderConfig, private logger: Logger) {
    const { timeout = 60000, retry = 3 } = config;
    this.http = ky.create({ timeout, retry });
  }

  async fetchSummary(resultUrl: string): Promise<string> {
    return this.fetchPage(resultUrl);
  }

  async fetchFullReport(resultUrl: string, options: FullReportOptions): Promise<ReportArtifact[]> {
    const base = stripTrailingSlash(resultUrl);
    const index = await this.fetchPage(base);

    const matchPages = collectMatchPages(index, base);
    this.logger.debug('Report index fetched', { resultUrl: base, matchPages: matchPages.length });

    let fetched = 0;
    const artifacts: ReportArtifact[] = [];
    const record = (artifact: ReportArtifact): ReportArtifact => {
      fetched++;
      options.onArtifact?.(artifact, fetched);
      return artifact;
    };

    artifacts.push(record({ path: 'index.html', content: rewriteLinks(index, base) }));

    const matchHtml = await mapWithConcurrency(matchPages, options.concurrency, async (page) => {
      const html = await this.fetchPage(`${base}/${page}`);
      return { page, html };
    });

    const frames: string[] = [];
    for (const { page, html } of matchHtml) {
      artifacts.push(record({ path: page, content: rewriteLinks(html, base) }));
      for (const frame of collectFrames(html, base)) {
        if (!frames.includes(frame)) frames.push(frame);
      }
    }

    const frameArtifacts = await mapWithConcurrency(frames, options.concurrency, async (frame) => {
      const html = await this.fetchPage(`${base}/${frame}`);
      return record({ path: frame, content: rewriteLinks(html, base) });
    });
    artifacts.push(...frameArtifacts);

    return artifacts;
  }

  private async fetchPage(url: string): Promise<string> {
    try {
      return await this.http.get(url).text();
    } catch (error) {
      throw new SimilarityServiceError(
        `Failed to download ${url}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Name of a page directly under the result URL, or null for anything else
 * (other results, external links, nested paths).
 */
function pageUnder(link: string, base: string): string | null {
  let resolved: URL;
  try {
    resolved = new URL(link, `${base}/`);
  } catch {
    return null;
  }
  const prefix = `${base}/`;
  const href = `${resolved.origin}${resolved.pathname}`;
  if (!href.startsWith(prefix)) return null;
  const page = href.slice(prefix.length);
  return page !== '' && !page.includes('/') ? page : null;
}

/**
 * Match pages linked from the index, in order of first appearance
 */
export function collectMatchPages(indexHtml: string, base: string): string[] {
  const pages: string[] = [];
  for (const [, link] of indexHtml.matchAll(HREF_PATTERN)) {
    const page = link === undefined ? null : pageUnder(link, base);
    if (page && MATCH_PAGE_PATTERN.test(page) && !pages.includes(page)) {
      pages.push(page);
    }
  }
  return pages;
}

/**
 * Frame documents referenced by a match page
 */
export function collectFrames(matchHtml: string, base: string): string[] {
  const frames: string[] = [];
  for (const [, src] of matchHtml.matchAll(FRAME_SRC_PATTERN)) {
    const page = src === undefined ? null : pageUnder(src, base);
    if (page && !frames.includes(page)) {
      frames.push(page);
    }
  }
  return frames;
}

/**
 * Point absolute links into the result at the local copies
 */
export function rewriteLinks(html: string, base: string): string {
  return html.split(`${base}/`).join('');
}
