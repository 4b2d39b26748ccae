import fs from 'fs';
import path from 'path';
import { execFileSync } from 'child_process';
import * as git from 'isomorphic-git';
import { PublishError, type PublishAgent, type PublishResult } from '../core/types/daylog';

export interface CommitAuthor {
  name: string;
  email: string;
}

export type PushRunner = (repoRoot: string) => void;

export interface GitPublisherOptions {
  author?: CommitAuthor;
  push?: boolean;
  runPush?: PushRunner;
}

const DEFAULT_AUTHOR: CommitAuthor = { name: 'daylog', email: 'daylog@localhost' };

/**
 * Push through the git CLI so the user's credential helpers and SSH setup apply.
 */
export const cliPush: PushRunner = (repoRoot) => {
  try {
    execFileSync('git', ['-C', repoRoot, 'push'], { stdio: 'pipe' });
  } catch (error) {
    const stderr = error instanceof Error && 'stderr' in error && Buffer.isBuffer(error.stderr)
      ? error.stderr.toString().trim()
      : '';
    const reason = stderr || (error instanceof Error ? error.message : String(error));
    throw new PublishError(`git push failed in ${repoRoot}: ${reason}`, error);
  }
};

/**
 * A value as `git config` resolves it for the repository, or undefined when unset.
 */
export function cliConfigValue(repoRoot: string, key: string): string | undefined {
  try {
    const value = execFileSync('git', ['-C', repoRoot, 'config', key], { stdio: 'pipe' }).toString().trim();
    return value || undefined;
  } catch (error) {
    // git config exits 1 when the key is unset
    if (error instanceof Error && 'status' in error && error.status === 1) return undefined;
    console.warn(`[GitPublisher] Could not read ${key} from git config: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

/**
 * GitPublisher stages the changed log file, commits it and pushes the
 * log repository.
 */
export class GitPublisher implements PublishAgent {
  private readonly push: boolean;
  private readonly runPush: PushRunner;

  constructor(private readonly options: GitPublisherOptions = {}) {
    this.push = options.push ?? true;
    this.runPush = options.runPush ?? cliPush;
  }

  async hasLockFiles(repoRoot: string): Promise<boolean> {
    const gitDir = path.join(repoRoot, '.git');
    try {
      const entries = await fs.promises.readdir(gitDir);
      return entries.some(name => name.endsWith('.lock'));
    } catch {
      // No .git directory to hold locks
      return false;
    }
  }

  /**
   * Options first, then the log repository's own config, then whatever the
   * git CLI resolves (which includes ~/.gitconfig and the system config).
   */
  private async resolveAuthor(repoRoot: string): Promise<CommitAuthor> {
    if (this.options.author) return this.options.author;

    const localName: unknown = await git.getConfig({ fs, dir: repoRoot, path: 'user.name' });
    const localEmail: unknown = await git.getConfig({ fs, dir: repoRoot, path: 'user.email' });
    const name = typeof localName === 'string' && localName ? localName : cliConfigValue(repoRoot, 'user.name');
    const email = typeof localEmail === 'string' && localEmail ? localEmail : cliConfigValue(repoRoot, 'user.email');

    if (!name) return DEFAULT_AUTHOR;
    return { name, email: email ?? DEFAULT_AUTHOR.email };
  }

  async commitAndPush(logRepoRoot: string, changedFile: string, message: string): Promise<PublishResult> {
    const filepath = path.relative(logRepoRoot, changedFile).split(path.sep).join('/');
    if (!filepath || filepath.startsWith('..') || path.isAbsolute(filepath)) {
      return { success: false, error: new PublishError(`${changedFile} is outside the log repository ${logRepoRoot}`) };
    }

    if (await this.hasLockFiles(logRepoRoot)) {
      return { success: false, error: new PublishError(`Git lock files present in ${logRepoRoot}, skipping publish`) };
    }

    let hash: string;
    try {
      const status = await git.status({ fs, dir: logRepoRoot, filepath });
      if (status === 'unmodified') {
        console.log(`[GitPublisher] No changes to commit in ${logRepoRoot}`);
        return { success: true, hash: null, pushed: false };
      }

      await git.add({ fs, dir: logRepoRoot, filepath });
      hash = await git.commit({
        fs,
        dir: logRepoRoot,
        message,
        author: await this.resolveAuthor(logRepoRoot),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { success: false, error: new PublishError(`Commit failed in ${logRepoRoot}: ${reason}`, error) };
    }

    if (!this.push) {
      return { success: true, hash, pushed: false };
    }

    const remotes = await git.listRemotes({ fs, dir: logRepoRoot });
    if (remotes.length === 0) {
      return { success: true, hash, pushed: false };
    }

    try {
      this.runPush(logRepoRoot);
    } catch (error) {
      const publishError = error instanceof PublishError
        ? error
        : new PublishError(`Push failed in ${logRepoRoot}: ${error instanceof Error ? error.message : String(error)}`, error);
      return { success: false, error: publishError };
    }
    return { success: true, hash, pushed: true };
  }
}
