import { describe, test, expect } from 'vitest';
import * as path from 'path';
import { buildJobs, planChunks, type FileDiscovery, type JobPlan } from '../job-factory';

function filesOf(group: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `/data/${group}/team${String(i).padStart(3, '0')}/main.c`);
}

function createDiscovery(groups: Record<string, Record<string, string[]>>): FileDiscovery & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    findInputFiles: async (group, pattern) => {
      calls.push(`${pattern}:${group}`);
      return groups[pattern]?.[group] ?? [];
    },
  };
}

const basePlan: JobPlan = {
  outputDir: '/out',
  language: 'c',
  filePatterns: ['*/*.c'],
  currentGroups: ['A'],
  previousGroups: ['B'],
  baselineFiles: ['/out/base/base_0/starter.c'],
  displayPrefix: '/data/',
  maxBatchFiles: 100,
  minChunkFiles: 50,
};

describe('planChunks', () => {
  test('should split evenly within the remaining capacity', () => {
    expect(planChunks(120, 97, 50)).toEqual([60, 60]);
    expect(planChunks(10, 4, 0)).toEqual([4, 3, 3]);
    expect(planChunks(40, 97, 50)).toEqual([40]);
  });

  test('should produce no chunks for no files', () => {
    expect(planChunks(0, 97, 50)).toEqual([]);
  });

  test('should fall back to the floor when there is no room left', () => {
    expect(planChunks(10, 0, 4)).toEqual([4, 3, 3]);
    expect(planChunks(3, -5, 0)).toEqual([1, 1, 1]);
  });

  test('should partition exactly and stay within bounds', () => {
    for (let total = 1; total <= 60; total++) {
      for (let remaining = -2; remaining <= 30; remaining++) {
        for (const floor of [0, 1, 5, 20]) {
          const sizes = planChunks(total, remaining, floor);
          const capacity = remaining > 0 ? remaining : Math.max(floor, 1);

          expect(sizes.reduce((sum, size) => sum + size, 0)).toBe(total);
          expect(Math.max(...sizes)).toBeLessThanOrEqual(capacity);
          expect(Math.max(...sizes) - Math.min(...sizes)).toBeLessThanOrEqual(1);
          expect(sizes.length).toBe(Math.ceil(total / capacity));
        }
      }
    }
  });
});

describe('buildJobs', () => {
  test('should build a self job and chunked jobs against the previous group', async () => {
    const a = filesOf('A', 3);
    const b = filesOf('B', 120);

    const jobs = await buildJobs(basePlan, createDiscovery({ '*/*.c': { A: a, B: b } }));

    expect(jobs.map(job => job.identifier)).toEqual(['___.c_A', '___.c_A_vs_B_part0', '___.c_A_vs_B_part1']);
    expect(jobs.map(job => job.inputFiles.length)).toEqual([3, 63, 63]);
    expect(jobs[0]?.inputFiles).toEqual(a);
    expect(jobs[1]?.inputFiles).toEqual([...a, ...b.slice(0, 60)]);
    expect(jobs[2]?.inputFiles).toEqual([...a, ...b.slice(60)]);
  });

  test('should carry the plan into every descriptor', async () => {
    const jobs = await buildJobs(basePlan, createDiscovery({ '*/*.c': { A: filesOf('A', 2) } }));

    expect(jobs).toEqual([
      {
        identifier: '___.c_A',
        reportPath: path.join('/out', '___.c_A_reports'),
        inputFiles: filesOf('A', 2),
        baselineFiles: ['/out/base/base_0/starter.c'],
        language: 'c',
        displayPrefix: '/data/',
      },
    ]);
  });

  test('should skip current groups without files', async () => {
    const discovery = createDiscovery({ '*/*.c': { B: filesOf('B', 10) } });

    await expect(buildJobs(basePlan, discovery)).resolves.toEqual([]);
    expect(discovery.calls).toEqual(['*/*.c:A']);
  });

  test('should walk patterns, then current groups, then previous groups', async () => {
    const plan: JobPlan = {
      ...basePlan,
      filePatterns: ['*.c', '*.h'],
      currentGroups: ['A', 'C'],
      previousGroups: ['B'],
    };
    const discovery = createDiscovery({
      '*.c': { A: filesOf('A', 1), B: filesOf('B', 1), C: filesOf('C', 1) },
      '*.h': { A: filesOf('A', 1) },
    });

    const jobs = await buildJobs(plan, discovery);

    expect(jobs.map(job => job.identifier)).toEqual([
      '_.c_A',
      '_.c_A_vs_B_part0',
      '_.c_C',
      '_.c_C_vs_B_part0',
      '_.h_A',
    ]);
  });

  test('should give groups with the same slug distinct identifiers and report paths', async () => {
    const plan: JobPlan = { ...basePlan, currentGroups: ['lab 1', 'lab_1'] };
    const discovery = createDiscovery({
      '*/*.c': { 'lab 1': filesOf('lab 1', 2), lab_1: filesOf('lab_1', 2), B: filesOf('B', 2) },
    });

    const jobs = await buildJobs(plan, discovery);

    expect(jobs.map(job => job.identifier)).toEqual([
      '___.c_lab_1',
      '___.c_lab_1_vs_B_part0',
      '___.c_lab_1_2',
      '___.c_lab_1_vs_B_part0_2',
    ]);
    expect(new Set(jobs.map(job => job.reportPath)).size).toBe(4);
    expect(jobs[2]?.reportPath).toBe(path.join('/out', '___.c_lab_1_2_reports'));
  });
});
