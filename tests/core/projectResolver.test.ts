import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { findConfiguredProject, resolveProject } from '../../src/core/projectResolver';
import { normalizePath } from '../../src/core/paths';
import type { Config, Project, VersionControl } from '../../src/core/types/daylog';

function configOf(projects: Project[], globalLogRepo?: string): Config {
  return { globalLogRepo, projects: new Map(projects.map(p => [p.name, p])) };
}

function fakeVcs(findRepoRoot: VersionControl['findRepoRoot']): VersionControl {
  return {
    findRepoRoot: vi.fn(findRepoRoot),
    readHeadCommit: vi.fn(async () => undefined),
  };
}

// Paths under a directory that does not exist normalize lexically
const BASE = path.join(os.tmpdir(), 'daylog-resolver-missing');

describe('findConfiguredProject', () => {
  it('should prefer the most specific root', () => {
    const config = configOf([
      { name: 'outer', root: path.join(BASE, 'work') },
      { name: 'inner', root: path.join(BASE, 'work', 'inner') },
    ]);

    expect(findConfiguredProject(path.join(BASE, 'work', 'inner', 'src'), config)?.name).toBe('inner');
    expect(findConfiguredProject(path.join(BASE, 'work', 'other'), config)?.name).toBe('outer');
  });

  it('should keep the first declared project when roots are equal', () => {
    const config = configOf([
      { name: 'first', root: path.join(BASE, 'shared') },
      { name: 'second', root: `${path.join(BASE, 'shared')}${path.sep}` },
    ]);

    expect(findConfiguredProject(path.join(BASE, 'shared', 'x'), config)?.name).toBe('first');
  });

  it('should not match a sibling that shares a name prefix', () => {
    const config = configOf([{ name: 'app', root: path.join(BASE, 'app') }]);

    expect(findConfiguredProject(path.join(BASE, 'app2'), config)).toBeUndefined();
  });

  describe('with symlinks', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'daylog-resolver-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should match a root given through a symlink', () => {
      const real = path.join(tempDir, 'real');
      fs.mkdirSync(path.join(real, 'src'), { recursive: true });
      const link = path.join(tempDir, 'link');
      fs.symlinkSync(real, link);

      const config = configOf([{ name: 'linked', root: link }]);
      const match = findConfiguredProject(path.join(real, 'src'), config);

      expect(match?.name).toBe('linked');
      expect(match?.root).toBe(normalizePath(real));
    });
  });
});

describe('resolveProject', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should let a configured project inherit the global log repository', async () => {
    const globalRepo = path.join(BASE, 'logs');
    const own = path.join(BASE, 'own-logs');
    const config = configOf([
      { name: 'plain', root: path.join(BASE, 'plain') },
      { name: 'custom', root: path.join(BASE, 'custom'), logRepo: own },
    ], globalRepo);
    const vcs = fakeVcs(async () => undefined);

    expect(await resolveProject(path.join(BASE, 'plain'), config, vcs)).toEqual({
      name: 'plain',
      root: path.join(BASE, 'plain'),
      logRepo: globalRepo,
    });
    expect((await resolveProject(path.join(BASE, 'custom', 'a'), config, vcs)).logRepo).toBe(own);
    expect(vcs.findRepoRoot).not.toHaveBeenCalled();
  });

  it('should name an unconfigured directory after its repository', async () => {
    const cwd = path.join(BASE, 'repos', 'my-repo', 'src');
    const vcs = fakeVcs(async () => path.join(BASE, 'repos', 'my-repo'));

    expect(await resolveProject(cwd, configOf([]), vcs)).toEqual({
      name: 'my-repo',
      root: cwd,
      logRepo: undefined,
    });
  });

  it('should fall back to the directory name outside a repository', async () => {
    const cwd = path.join(BASE, 'scratch');

    const project = await resolveProject(cwd, configOf([], path.join(BASE, 'logs')), fakeVcs(async () => undefined));

    expect(project).toEqual({ name: 'scratch', root: cwd, logRepo: path.join(BASE, 'logs') });
  });

  it('should not fail when the repository lookup throws', async () => {
    const cwd = path.join(BASE, 'broken');
    const vcs = fakeVcs(async () => {
      throw new Error('corrupt .git');
    });

    expect((await resolveProject(cwd, configOf([]), vcs)).name).toBe('broken');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
