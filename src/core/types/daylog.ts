export interface Project {
  name: string;
  root: string; // Absolute, normalized
  logRepo?: string; // Absolute log repository root; logs live in-place when absent
}

export interface Config {
  readonly globalLogRepo?: string;
  readonly projects: ReadonlyMap<string, Project>; // Declaration order is significant
}

/**
 * Parsed content of one daily markdown file.
 */
export interface DailyLog {
  preamble: string; // Literal text before the "# What I did" marker
  sections: Map<string, string[]>;
  footer: string; // Literal trailer, always ends with the "What Broke" marker
  broken: string[]; // Entries under "# What Broke or Got Weird"
}

export type SkeletonReason = 'missing' | 'unreadable' | 'unrecognized';

export type ParseResult =
  | { kind: 'parsed'; log: DailyLog }
  | { kind: 'skeleton'; reason: SkeletonReason };

export interface LogEntry {
  section: string;
  text: string;
  commitRef?: string; // Abbreviated hash
}

export interface CommitInfo {
  oid: string;
  message: string;
}

/**
 * Read-only view of the repository being committed to.
 */
export interface VersionControl {
  findRepoRoot(dir: string): Promise<string | undefined>;
  readHeadCommit(repoRoot: string): Promise<CommitInfo | undefined>;
}

export class PublishError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PublishError';
  }
}

export type PublishResult =
  | { success: true; hash: string | null; pushed: boolean }
  | { success: false; error: PublishError };

export interface PublishAgent {
  commitAndPush(logRepoRoot: string, changedFile: string, message: string): Promise<PublishResult>;
}
