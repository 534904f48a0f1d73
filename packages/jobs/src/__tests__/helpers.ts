import { vi } from 'vitest';
import type { Logger } from '@simbatch/core';
import { createJobDescriptor, type JobDescriptor } from '../types';

export function createMockLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

/**
 * A job whose report goes to `<dir>/<id>_reports`
 */
export function createTestJob(id: string, dir = '/tmp/simbatch-test', inputFiles = [`/data/${id}/main.c`]): JobDescriptor {
  return createJobDescriptor({
    identifier: id,
    reportPath: `${dir}/${id}_reports`,
    inputFiles,
    displayPrefix: '/data/',
  });
}
