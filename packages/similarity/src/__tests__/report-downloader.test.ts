/**
 * ReportDownloader against an in-process HTTP server
 */

import { describe, test, expect, beforeAll, afterAll, vi } from 'vitest';
import * as http from 'http';
import type { Logger } from '@simbatch/core';
import { ReportDownloader, collectFrames, collectMatchPages, rewriteLinks } from '../report-downloader';
import { SimilarityServiceError } from '../similarity-error';
import type { ReportArtifact } from '../types';

function createMockLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

function matchPage(n: number): string {
  return [
    '<HTML><FRAMESET ROWS="150,*">',
    `<FRAME SRC="match${n}-top.html" NAME="top" FRAMEBORDER=0>`,
    '<FRAMESET COLS="50%,50%">',
    `<FRAME SRC="match${n}-0.html" NAME="0">`,
    `<FRAME SRC="match${n}-1.html" NAME="1">`,
    '</FRAMESET></FRAMESET></HTML>',
  ].join('\n');
}

describe('ReportDownloader', () => {
  let server: http.Server;
  let base: string;
  const requested: string[] = [];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const url = req.url ?? '/';
      requested.push(url);
      const pages: Record<string, string> = {
        '/results/1/42': [
          '<HTML><TABLE>',
          `<TR><TD><A HREF="${base}/match0.html">team1/main.c (90%)</A>`,
          `<TD><A HREF="${base}/match0.html">team2/main.c (88%)</A>`,
          `<TR><TD><A HREF="${base}/match1.html">team3/main.c (40%)</A>`,
          '<A HREF="http://moss.example.test/general/format.html">Format</A>',
          '</TABLE></HTML>',
        ].join('\n'),
        '/results/1/42/match0.html': matchPage(0),
        '/results/1/42/match1.html': matchPage(1),
      };
      const page = pages[url];
      if (page !== undefined) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(page);
        return;
      }
      const frame = /^\/results\/1\/42\/(match\d+-(?:top|0|1)\.html)$/.exec(url);
      if (frame) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(`<HTML>${frame[1]} <A HREF="${base}/match0.html#1">back</A></HTML>`);
        return;
      }
      res.writeHead(404);
      res.end('not found');
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    base = `http://127.0.0.1:${port}/results/1/42`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  test('should fetch the summary page as-is', async () => {
    const downloader = new ReportDownloader({ retry: 0 }, createMockLogger());

    const html = await downloader.fetchSummary(base);

    expect(html).toContain(`<A HREF="${base}/match1.html">team3/main.c (40%)</A>`);
  });

  test('should fetch every match page and frame with relative links', async () => {
    const downloader = new ReportDownloader({ retry: 0 }, createMockLogger());
    const seen: string[] = [];

    const artifacts = await downloader.fetchFullReport(`${base}/`, {
      concurrency: 2,
      onArtifact: (artifact: ReportArtifact, fetched: number) => seen.push(`${fetched}:${artifact.path}`),
    });

    expect(artifacts.map(artifact => artifact.path)).toEqual([
      'index.html',
      'match0.html',
      'match1.html',
      'match0-top.html',
      'match0-0.html',
      'match0-1.html',
      'match1-top.html',
      'match1-0.html',
      'match1-1.html',
    ]);
    expect(seen).toHaveLength(9);
    expect(seen[0]).toBe('1:index.html');
    expect(artifacts[0]?.content).toContain('<A HREF="match0.html">team1/main.c (90%)</A>');
    expect(artifacts[0]?.content).toContain('<A HREF="http://moss.example.test/general/format.html">Format</A>');
    expect(artifacts[3]?.content).toBe('<HTML>match0-top.html <A HREF="match0.html#1">back</A></HTML>');
  });

  test('should wrap HTTP failures', async () => {
    const downloader = new ReportDownloader({ retry: 0 }, createMockLogger());

    await expect(downloader.fetchSummary(`${base}/missing.html`)).rejects.toBeInstanceOf(SimilarityServiceError);
  });
});

describe('report link helpers', () => {
  const base = 'http://moss.example.test/results/1/42';

  test('collectMatchPages should keep first appearance order without duplicates', () => {
    const html = [
      `<a href="${base}/match2.html">`,
      `<a href="${base}/match0.html">`,
      `<a href="${base}/match2.html">`,
      '<a href="http://moss.example.test/results/1/43/match0.html">',
      `<a href="${base}/general.html">`,
    ].join('');

    expect(collectMatchPages(html, base)).toEqual(['match2.html', 'match0.html']);
  });

  test('collectFrames should resolve relative and absolute sources', () => {
    const html = `<frame src="match0-top.html"><FRAME SRC="${base}/match0-0.html">`;

    expect(collectFrames(html, base)).toEqual(['match0-top.html', 'match0-0.html']);
  });

  test('rewriteLinks should strip the result prefix', () => {
    expect(rewriteLinks(`<a href="${base}/match0.html">x</a>`, base)).toBe('<a href="match0.html">x</a>');
  });
});
