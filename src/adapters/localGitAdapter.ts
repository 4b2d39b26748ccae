import fs from 'fs';
import * as git from 'isomorphic-git';
import type { CommitInfo, VersionControl } from '../core/types/daylog';

function isNotFound(error: unknown): boolean {
  return error instanceof git.Errors.NotFoundError;
}

/**
 * LocalGitAdapter reads the repository a hook fires in, straight from the
 * local filesystem.
 */
export class LocalGitAdapter implements VersionControl {
  /**
   * Nearest enclosing repository root, or undefined outside of a repository.
   */
  async findRepoRoot(dir: string): Promise<string | undefined> {
    try {
      return await git.findRoot({ fs, filepath: dir });
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  /**
   * The commit HEAD points at, or undefined on an unborn branch.
   */
  async readHeadCommit(repoRoot: string): Promise<CommitInfo | undefined> {
    let oid: string;
    try {
      oid = await git.resolveRef({ fs, dir: repoRoot, ref: 'HEAD' });
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
    const { commit } = await git.readCommit({ fs, dir: repoRoot, oid });
    return { oid, message: commit.message };
  }
}
