import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import * as git from 'isomorphic-git';

import { JournalService, isValidCommitRef } from '../../src/services/journalService';
import { EntryWriter } from '../../src/core/entryWriter';
import { LogStore } from '../../src/core/logStore';
import { GitPublisher } from '../../src/adapters/gitPublisher';
import { LocalGitAdapter } from '../../src/adapters/localGitAdapter';
import type { Config } from '../../src/core/types/daylog';

const AUTHOR = { name: 'Test User', email: 'test@example.com' };
const TODAY = () => new Date(2026, 9, 19, 14, 0);

describe('JournalService', () => {
  let tempDir: string;
  let logRepo: string;
  let demoRoot: string;
  let inPlaceRoot: string;

  function journalFor(config: Config): JournalService {
    const publisher = new GitPublisher({ author: AUTHOR, runPush: vi.fn() });
    const writer = new EntryWriter(new LogStore(), publisher, { inPlaceRoot, now: TODAY });
    return new JournalService(config, new LocalGitAdapter(), writer);
  }

  beforeEach(async () => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'daylog-journal-')));
    logRepo = path.join(tempDir, 'logs');
    demoRoot = path.join(tempDir, 'repos', 'demo');
    inPlaceRoot = path.join(tempDir, 'projects');
    fs.mkdirSync(logRepo);
    fs.mkdirSync(demoRoot, { recursive: true });
    await git.init({ fs, dir: logRepo });
    await git.init({ fs, dir: demoRoot });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('with a configured project', () => {
    let journal: JournalService;
    let logFile: string;

    beforeEach(() => {
      journal = journalFor({
        projects: new Map([['demo', { name: 'demo', root: demoRoot, logRepo }]]),
      });
      logFile = path.join(logRepo, 'demo', '2026-10-19.md');
    });

    it('should record a commit, ignore its repeat and keep notes under "other"', async () => {
      const first = await journal.recordCommit({ cwd: demoRoot, message: 'Fix bug', commitRef: 'a1b2c3d' });
      expect(first).toMatchObject({ status: 'added', filePath: logFile, project: { name: 'demo' } });
      expect(fs.readFileSync(logFile, 'utf8')).toContain('## demo\n- (a1b2c3d) Fix bug');

      const repeat = await journal.recordCommit({ cwd: demoRoot, message: 'Fix bug', commitRef: 'a1b2c3d' });
      expect(repeat).toMatchObject({ status: 'duplicate', published: null });

      const note = await journal.addNote(demoRoot, 'Had lunch');
      expect(note.status).toBe('added');

      expect(fs.readFileSync(logFile, 'utf8')).toBe(
        '# What I did\n\n## demo\n- (a1b2c3d) Fix bug\n\n## other\n- Had lunch\n\n# Whats next\n\n\n# What Broke or Got Weird\n',
      );

      const history = await git.log({ fs, dir: logRepo });
      expect(history.map(entry => entry.commit.message.trim())).toEqual([
        'Add manual entry to demo logs for 2026-10-19',
        'Update demo logs for 2026-10-19',
      ]);
    });

    it('should name the section after the repository the commit was made in', async () => {
      const nested = path.join(demoRoot, 'packages', 'api');
      fs.mkdirSync(nested, { recursive: true });

      await journal.recordCommit({ cwd: nested, message: 'Add endpoint', commitRef: 'abcdef1' });

      expect(fs.readFileSync(logFile, 'utf8')).toContain('## demo\n- (abcdef1) Add endpoint\n');
    });

    it('should add what-broke entries', async () => {
      await journal.addBroken(demoRoot, 'CI flaked');

      expect(fs.readFileSync(logFile, 'utf8')).toBe(
        '# What I did\n\n\n# Whats next\n\n\n# What Broke or Got Weird\n- CI flaked\n',
      );
    });

    it('should reject empty notes', async () => {
      await expect(journal.addNote(demoRoot, '   ')).rejects.toThrow('Entry text cannot be empty');
      await expect(journal.addBroken(demoRoot, '\n')).rejects.toThrow('Entry text cannot be empty');
      expect(fs.existsSync(logFile)).toBe(false);
    });

    it('should skip references that are not commit hashes', async () => {
      const outcome = await journal.recordCommit({ cwd: demoRoot, message: 'Fix bug', commitRef: 'no-sha' });

      expect(outcome).toEqual({ status: 'skipped', reason: 'not a commit hash: "no-sha"' });
      expect(fs.existsSync(logFile)).toBe(false);
    });

    it('should skip messages with no content', async () => {
      const outcome = await journal.recordCommit({ cwd: demoRoot, message: '\n# Please enter the commit message\n' });

      expect(outcome).toEqual({ status: 'skipped', reason: 'empty commit message' });
    });

    it('should locate the log file for a directory', async () => {
      const { project, file } = await journal.locate(demoRoot);

      expect(project).toEqual({ name: 'demo', root: demoRoot, logRepo });
      expect(file).toEqual({ filePath: logFile, logRepo, date: '2026-10-19' });
    });
  });

  it('should not log commits made in the log repository itself', async () => {
    const journal = journalFor({ globalLogRepo: logRepo, projects: new Map() });

    const outcome = await journal.recordCommit({ cwd: logRepo, message: 'Update demo logs', commitRef: 'a1b2c3d' });

    expect(outcome).toEqual({ status: 'skipped', reason: 'commit in the log repository' });
  });

  it('should keep logs of unconfigured repositories in place', async () => {
    const journal = journalFor({ projects: new Map() });

    const outcome = await journal.recordCommit({ cwd: demoRoot, message: 'Fix bug', commitRef: 'a1b2c3d' });

    expect(outcome).toMatchObject({
      status: 'added',
      filePath: path.join(inPlaceRoot, 'demo', '2026-10-19.md'),
      published: null,
    });
  });
});

describe('isValidCommitRef', () => {
  it('should accept short and full hex hashes only', () => {
    expect(isValidCommitRef('a1b2')).toBe(true);
    expect(isValidCommitRef('A1B2C3D')).toBe(true);
    expect(isValidCommitRef('a'.repeat(40))).toBe(true);
    expect(isValidCommitRef('abc')).toBe(false);
    expect(isValidCommitRef('a'.repeat(41))).toBe(false);
    expect(isValidCommitRef('no-sha')).toBe(false);
  });
});
