import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { cloneRepository, type GitRunner } from '../git';
import { cloneBaseRepositories, cloneGroups, type GroupDirectory } from '../clone';
import { createMockLogger } from './helpers';

/**
 * Stand-in for the git executable: records calls and creates the target
 * directory unless the call is listed as failing
 */
function createFakeGit(failing: (args: string[]) => boolean = () => false) {
  const calls: string[][] = [];
  const git: GitRunner = async (args) => {
    calls.push(args);
    if (failing(args)) {
      throw new Error('fatal: could not read from remote repository');
    }
    const target = args[args.length - 1];
    if (target) fs.mkdirSync(target, { recursive: true });
  };
  return { git, calls };
}

describe('cloneRepository', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'clone-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  test('should leave an existing checkout alone', async () => {
    const target = path.join(tmp, 'team1');
    fs.mkdirSync(target);
    const { git, calls } = createFakeGit();

    const result = await cloneRepository('git@gitlab.test:team1.git', target, { branch: 'main', logger: createMockLogger(), git });

    expect(result).toBe('exists');
    expect(calls).toEqual([]);
  });

  test('should clone the requested branch', async () => {
    const target = path.join(tmp, 'team1');
    const { git, calls } = createFakeGit();

    const result = await cloneRepository('git@gitlab.test:team1.git', target, { branch: 'hw3', logger: createMockLogger(), git });

    expect(result).toBe('cloned');
    expect(calls).toEqual([['clone', '--branch', 'hw3', 'git@gitlab.test:team1.git', target]]);
  });

  test('should fall back to the default branch', async () => {
    const target = path.join(tmp, 'team1');
    const { git, calls } = createFakeGit(args => args.includes('--branch'));

    const result = await cloneRepository('git@gitlab.test:team1.git', target, { branch: 'hw3', logger: createMockLogger(), git });

    expect(result).toBe('cloned-default-branch');
    expect(calls).toEqual([
      ['clone', '--branch', 'hw3', 'git@gitlab.test:team1.git', target],
      ['clone', 'git@gitlab.test:team1.git', target],
    ]);
    expect(fs.existsSync(target)).toBe(true);
  });

  test('should log and skip when both attempts fail', async () => {
    const target = path.join(tmp, 'team1');
    const logger = createMockLogger();
    const { git } = createFakeGit(() => true);

    const result = await cloneRepository('git@gitlab.test:team1.git', target, { branch: 'hw3', logger, git });

    expect(result).toBe('failed');
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(target)).toBe(false);
  });
});

describe('cloneGroups', () => {
  let tmp: string;

  const directory: GroupDirectory = {
    listGroups: async (names) =>
      [{ id: 7, name: 'cse101-fall', full_path: 'courses/cse101-fall' }].filter(group => names.includes(group.name)),
    listProjects: async () => [
      { id: 1, name: 'team1', path: 'team1', ssh_url_to_repo: 'git@gitlab.test:team1.git', default_branch: 'main' },
      { id: 2, name: 'team2', path: 'team2', ssh_url_to_repo: 'git@gitlab.test:team2.git', default_branch: 'main' },
    ],
  };

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'clone-groups-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  test('should clone every project under files/<group>/<project>', async () => {
    const { git, calls } = createFakeGit();
    const seen: string[] = [];

    const summary = await cloneGroups(directory, ['cse101-fall'], tmp, {
      branch: 'main',
      logger: createMockLogger(),
      git,
      onProject: (group, project, result) => seen.push(`${group}/${project}:${result}`),
    });

    expect(summary).toEqual({ cloned: 2, existing: 0, failed: 0 });
    expect(calls.map(args => args[args.length - 1])).toEqual([
      path.join(tmp, 'cse101-fall', 'team1'),
      path.join(tmp, 'cse101-fall', 'team2'),
    ]);
    expect(seen).toEqual(['cse101-fall/team1:cloned', 'cse101-fall/team2:cloned']);
  });

  test('should count existing checkouts on a second pass', async () => {
    const { git } = createFakeGit();
    await cloneGroups(directory, ['cse101-fall'], tmp, { branch: 'main', logger: createMockLogger(), git });

    const summary = await cloneGroups(directory, ['cse101-fall'], tmp, { branch: 'main', logger: createMockLogger(), git });

    expect(summary).toEqual({ cloned: 0, existing: 2, failed: 0 });
  });

  test('should skip a group whose projects cannot be listed', async () => {
    const { git, calls } = createFakeGit();
    const logger = createMockLogger();
    const partlyBroken: GroupDirectory = {
      listGroups: async () => [
        { id: 7, name: 'cse101-fall', full_path: 'courses/cse101-fall' },
        { id: 8, name: 'cse101-spring', full_path: 'courses/cse101-spring' },
      ],
      listProjects: async (groupId) => {
        if (groupId === 7) throw new Error('GitLab request to groups/7/projects failed: 403 Forbidden');
        return [{ id: 3, name: 'team3', path: 'team3', ssh_url_to_repo: 'git@gitlab.test:team3.git', default_branch: 'main' }];
      },
    };

    const summary = await cloneGroups(partlyBroken, ['cse101-fall', 'cse101-spring'], tmp, {
      branch: 'main',
      logger,
      git,
    });

    expect(summary).toEqual({ cloned: 1, existing: 0, failed: 1 });
    expect(calls.map(args => args[args.length - 1])).toEqual([path.join(tmp, 'cse101-spring', 'team3')]);
    expect(logger.warn).toHaveBeenCalledWith('Could not list projects, skipping group', {
      group: 'cse101-fall',
      error: 'GitLab request to groups/7/projects failed: 403 Forbidden',
    });
  });

  test('should clone base repositories into output/base/base_<i>', async () => {
    const { git, calls } = createFakeGit();

    const summary = await cloneBaseRepositories(
      ['git@gitlab.test:starter.git', 'git@gitlab.test:library.git'],
      tmp,
      { logger: createMockLogger(), git }
    );

    expect(summary).toEqual({ cloned: 2, existing: 0, failed: 0 });
    expect(calls).toEqual([
      ['clone', 'git@gitlab.test:starter.git', path.join(tmp, 'base', 'base_0')],
      ['clone', 'git@gitlab.test:library.git', path.join(tmp, 'base', 'base_1')],
    ]);
  });
});
