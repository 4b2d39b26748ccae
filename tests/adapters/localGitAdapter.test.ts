import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import * as git from 'isomorphic-git';

import { LocalGitAdapter } from '../../src/adapters/localGitAdapter';

const AUTHOR = { name: 'Test User', email: 'test@example.com' };

describe('LocalGitAdapter', () => {
  let tempDir: string;
  let repoPath: string;
  let adapter: LocalGitAdapter;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'daylog-git-'));
    repoPath = path.join(tempDir, 'sample-repo');
    fs.mkdirSync(repoPath);
    await git.init({ fs, dir: repoPath });
    adapter = new LocalGitAdapter();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should find the repository root from a nested directory', async () => {
    const nested = path.join(repoPath, 'src', 'lib');
    fs.mkdirSync(nested, { recursive: true });

    expect(await adapter.findRepoRoot(nested)).toBe(repoPath);
  });

  it('should return undefined outside of a repository', async () => {
    const outside = path.join(tempDir, 'not-a-repo');
    fs.mkdirSync(outside);

    expect(await adapter.findRepoRoot(outside)).toBeUndefined();
  });

  it('should return undefined for HEAD on an unborn branch', async () => {
    expect(await adapter.readHeadCommit(repoPath)).toBeUndefined();
  });

  it('should read the commit HEAD points at', async () => {
    fs.writeFileSync(path.join(repoPath, 'README.md'), '# Sample\n');
    await git.add({ fs, dir: repoPath, filepath: 'README.md' });
    const oid = await git.commit({ fs, dir: repoPath, message: 'Initial commit', author: AUTHOR });

    const head = await adapter.readHeadCommit(repoPath);

    expect(head?.oid).toBe(oid);
    expect(head?.message.trim()).toBe('Initial commit');
  });
});
