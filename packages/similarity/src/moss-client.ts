/**
 * MOSS Client
 *
 * Speaks the MOSS submission protocol over a plain TCP socket:
 *
 *   moss <userid> / directory <d> / X <x> / maxmatches <m> / show <n> / language <l>
 *   <- yes | no
 *   file <id> <lang> <size> <name> + raw bytes     (id 0 for base files, 1.. for inputs)
 *   query 0 <comment>
 *   <- result URL
 *   end
 *
 * The user id is injected at construction; nothing here reads the process
 * environment.
 */

import * as net from 'net';
import { promises as fs } from 'fs';
import type { Logger } from '@simbatch/core';
import { isSupportedLanguage } from './languages';
import { ReportDownloader } from './report-downloader';
import { SimilarityServiceError } from './similarity-error';
import type {
  FullReportOptions,
  ReportArtifact,
  SimilarityService,
  SubmissionRequest,
  UploadProgress,
} from './types';

export interface MossClientConfig {
  userId: string;
  host?: string;
  port?: number;
  /** Socket inactivity timeout; the server may think for minutes after `query` */
  timeout?: number;
  downloader?: ReportDownloader;
}

export const DEFAULT_MOSS_HOST = 'moss.stanford.edu';
export const DEFAULT_MOSS_PORT = 7690;

export class MossClient implements SimilarityService {
  private userId: string;
  private host: string;
  private port: number;
  private timeout: number;
  private downloader: ReportDownloader;

  constructor(config: MossClientConfig, private logger: Logger) {
    this.userId = config.userId;
    this.host = config.host ?? DEFAULT_MOSS_HOST;
    this.port = config.port ?? DEFAULT_MOSS_PORT;
    this.timeout = config.timeout ?? 15 * 60 * 1000;
    this.downloader = config.downloader ?? new ReportDownloader({}, logger);
  }

  async submit(request: SubmissionRequest, onUpload?: (progress: UploadProgress) => void): Promise<string> {
    const { language, options } = request;
    if (!isSupportedLanguage(language)) {
      throw new SimilarityServiceError(`Language not supported by the server: ${language}`);
    }

    const uploads = [
      ...request.baselineFiles.map(path => ({ path, displayName: path, fileId: 0 })),
      ...request.inputFiles.map((file, index) => ({ ...file, fileId: index + 1 })),
    ];

    const session = await this.connect();
    try {
      await session.write(`moss ${this.userId}\n`);
      await session.write(`directory ${options.d}\n`);
      await session.write(`X ${options.x}\n`);
      await session.write(`maxmatches ${options.m}\n`);
      await session.write(`show ${options.n}\n`);
      await session.write(`language ${language}\n`);

      const accepted = await session.readLine();
      if (accepted === 'no') {
        const rejection = new SimilarityServiceError(`Language not accepted by server: ${language}`);
        await session.write('end\n').catch((error: unknown) => {
          this.logger.debug('Could not send end after rejection', { error: String(error) });
        });
        throw rejection;
      }

      for (const [position, upload] of uploads.entries()) {
        const content = await fs.readFile(upload.path);
        const name = toWireName(upload.displayName);
        await session.write(`file ${upload.fileId} ${language} ${content.length} ${name}\n`);
        await session.write(content);
        onUpload?.({ path: upload.path, displayName: name, index: position + 1, total: uploads.length });
      }

      await session.write(`query 0 ${options.c}\n`);
      this.logger.debug('Files uploaded, waiting for results', { files: uploads.length });

      const url = await session.readLine();
      await session.write('end\n');

      if (!/^https?:\/\//.test(url)) {
        throw new SimilarityServiceError(`Unexpected response from server: ${JSON.stringify(url)}`);
      }
      return url;
    } finally {
      session.close();
    }
  }

  async fetchSummary(resultUrl: string): Promise<string> {
    return this.downloader.fetchSummary(resultUrl);
  }

  async fetchFullReport(resultUrl: string, options: FullReportOptions): Promise<ReportArtifact[]> {
    return this.downloader.fetchFullReport(resultUrl, options);
  }

  private connect(): Promise<SocketSession> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });
      const onError = (error: Error) => {
        reject(new SimilarityServiceError(`Could not connect to ${this.host}:${this.port}: ${error.message}`, error));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new SocketSession(socket, this.timeout));
      });
    });
  }
}

/**
 * Names are space-delimited on the wire
 */
export function toWireName(displayName: string): string {
  return displayName.replace(/ /g, '_').replace(/\\/g, '/');
}

/**
 * Line-oriented reads and awaited writes over one socket
 */
class SocketSession {
  private buffer = '';
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(private socket: net.Socket, timeout: number) {
    socket.on('data', (chunk: Buffer) => {
      this.buffer += chunk.toString('utf-8');
      this.notify();
    });
    socket.on('end', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('close', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('error', (error) => {
      this.failure = new SimilarityServiceError(`Connection error: ${error.message}`, error);
      this.notify();
    });
    socket.setTimeout(timeout, () => {
      this.failure = new SimilarityServiceError(`No response from server within ${timeout}ms`);
      socket.destroy();
      this.notify();
    });
  }

  write(data: string | Buffer): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.socket.write(data, (error) => {
        if (error) {
          reject(this.failure ?? new SimilarityServiceError(`Connection error: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Next newline-terminated reply, trimmed. A final unterminated reply is
   * returned when the server closes the connection.
   */
  async readLine(): Promise<string> {
    for (;;) {
      const newline = this.buffer.indexOf('\n');
      if (newline !== -1) {
        const line = this.buffer.slice(0, newline);
        this.buffer = this.buffer.slice(newline + 1);
        return line.trim();
      }
      if (this.failure) throw this.failure;
      if (this.ended) {
        const rest = this.buffer.trim();
        this.buffer = '';
        if (rest !== '') return rest;
        throw new SimilarityServiceError('Connection closed by server');
      }
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  close(): void {
    this.socket.end();
    this.socket.destroy();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
