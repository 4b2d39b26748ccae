import path from 'path';
import type { Config, Project, VersionControl } from '../core/types/daylog';
import { resolveProject } from '../core/projectResolver';
import { commitEntry, manualEntry, normalizeText } from '../core/entryWriter';
import type { EntryWriter, LogFileInfo, WriteOutcome } from '../core/entryWriter';
import { isWithin, normalizePath } from '../core/paths';

const VALID_REF = /^[0-9a-f]{4,40}$/i;

export interface RecordCommitRequest {
  cwd: string;
  message: string;
  commitRef?: string;
}

export type RecordOutcome =
  | { status: 'skipped'; reason: string }
  | (WriteOutcome & { project: Project });

export function isValidCommitRef(ref: string): boolean {
  return VALID_REF.test(ref);
}

/**
 * JournalService is the aggregation path shared by the hooks and the
 * companion commands: resolve the project, then hand the entry to the
 * EntryWriter.
 */
export class JournalService {
  constructor(
    private readonly config: Config,
    private readonly vcs: VersionControl,
    private readonly writer: EntryWriter,
  ) {}

  resolve(cwd: string): Promise<Project> {
    return resolveProject(cwd, this.config, this.vcs);
  }

  async locate(cwd: string): Promise<{ project: Project; file: LogFileInfo }> {
    const project = await this.resolve(cwd);
    return { project, file: this.writer.logFileFor(project) };
  }

  /**
   * Record a commit made in the repository containing `cwd`.
   */
  async recordCommit(request: RecordCommitRequest): Promise<RecordOutcome> {
    if (request.commitRef !== undefined && !isValidCommitRef(request.commitRef)) {
      return { status: 'skipped', reason: `not a commit hash: "${request.commitRef}"` };
    }

    const cwd = normalizePath(request.cwd);
    const repoRoot = (await this.vcs.findRepoRoot(cwd)) ?? cwd;
    const project = await this.resolve(cwd);

    // Commits to the log repository itself come from publishing
    if (project.logRepo && isWithin(normalizePath(project.logRepo), normalizePath(repoRoot))) {
      return { status: 'skipped', reason: 'commit in the log repository' };
    }

    const entry = commitEntry(path.basename(repoRoot) || project.name, request.message, request.commitRef);
    if (!entry.text) {
      return { status: 'skipped', reason: 'empty commit message' };
    }

    const outcome = await this.writer.commit(project, entry);
    return { ...outcome, project };
  }

  async addNote(cwd: string, text: string): Promise<WriteOutcome & { project: Project }> {
    const entry = manualEntry(text);
    if (!entry.text) throw new Error('Entry text cannot be empty');
    const project = await this.resolve(cwd);
    return { ...(await this.writer.commit(project, entry)), project };
  }

  async addBroken(cwd: string, text: string): Promise<WriteOutcome & { project: Project }> {
    if (!normalizeText(text)) throw new Error('Entry text cannot be empty');
    const project = await this.resolve(cwd);
    return { ...(await this.writer.commitBroken(project, text)), project };
  }
}
