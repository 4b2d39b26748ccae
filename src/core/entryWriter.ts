import path from 'path';
import { PublishError } from './types/daylog';
import type { DailyLog, LogEntry, Project, PublishAgent, PublishResult } from './types/daylog';
import { OTHER_SECTION, type LogStore } from './logStore';
import { formatLocalDate } from './paths';

export const SHORT_REF_LENGTH = 7;

const ANNOTATED_LINE = /^- \(([^)\s]+)\) (.*)$/;

export type ApplyOutcome = 'added' | 'duplicate';

export interface ApplyResult {
  log: DailyLog;
  outcome: ApplyOutcome;
  superseded: string[]; // Lines removed because an amended commit replaced them
}

export function renderEntry(entry: LogEntry): string {
  return entry.commitRef ? `- (${entry.commitRef}) ${entry.text}` : `- ${entry.text}`;
}

/**
 * Split a rendered line back into its hash annotation and text.
 * Returns null for lines that are not list entries.
 */
export function parseEntryLine(line: string): { commitRef?: string; text: string } | null {
  const annotated = ANNOTATED_LINE.exec(line);
  if (annotated) return { commitRef: annotated[1], text: annotated[2] };
  if (line.startsWith('- ')) return { text: line.slice(2) };
  return null;
}

/** Collapse free-form input onto a single line. */
export function normalizeText(text: string): string {
  return text.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

/** First line of a commit message that carries content (git comment lines excluded). */
export function commitSubject(message: string): string {
  for (const line of message.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('#')) return trimmed;
  }
  return '';
}

export function commitEntry(repoName: string, message: string, commitRef?: string): LogEntry {
  return {
    section: repoName,
    text: commitSubject(message),
    commitRef: commitRef ? commitRef.slice(0, SHORT_REF_LENGTH) : undefined,
  };
}

export function manualEntry(text: string): LogEntry {
  return { section: OTHER_SECTION, text: normalizeText(text) };
}

function cloneLog(log: DailyLog): DailyLog {
  return {
    preamble: log.preamble,
    sections: new Map([...log.sections].map(([name, entries]) => [name, [...entries]])),
    footer: log.footer,
    broken: [...log.broken],
  };
}

/**
 * Add an entry to its section. Pure: the input log is never mutated.
 *
 * An identical existing line makes the call a no-op. A hash-annotated
 * entry replaces earlier lines of the same section carrying the same text
 * under another hash (or none), which is what amending a commit produces.
 */
export function applyEntry(log: DailyLog, entry: LogEntry): ApplyResult {
  const line = renderEntry(entry);
  const existing = log.sections.get(entry.section) ?? [];
  if (existing.includes(line)) {
    return { log, outcome: 'duplicate', superseded: [] };
  }

  const superseded: string[] = [];
  const kept = existing.filter(candidate => {
    if (!entry.commitRef) return true;
    const parsed = parseEntryLine(candidate);
    if (parsed && parsed.text === entry.text && parsed.commitRef !== entry.commitRef) {
      superseded.push(candidate);
      return false;
    }
    return true;
  });

  const next = cloneLog(log);
  next.sections.set(entry.section, [...kept, line]);
  return { log: next, outcome: 'added', superseded };
}

/** Add a line under "# What Broke or Got Weird". */
export function applyBrokenEntry(log: DailyLog, text: string): ApplyResult {
  const line = `- ${normalizeText(text)}`;
  if (log.broken.includes(line)) {
    return { log, outcome: 'duplicate', superseded: [] };
  }
  const next = cloneLog(log);
  next.broken.push(line);
  return { log: next, outcome: 'added', superseded: [] };
}

export interface LogFileInfo {
  filePath: string;
  logRepo?: string; // Set when the file lives in a log repository that gets published
  date: string;
}

export interface WriteOutcome {
  status: ApplyOutcome;
  filePath: string;
  published: PublishResult | null; // null when nothing was published
}

export interface EntryWriterOptions {
  inPlaceRoot: string;
  now?: () => Date;
}

/**
 * Persists entries: reload, apply, atomic save, then publish when the
 * project has a log repository. Publishing failures are reported but never
 * thrown; the local file is the source of truth.
 */
export class EntryWriter {
  private readonly now: () => Date;

  constructor(
    private readonly store: LogStore,
    private readonly publisher: PublishAgent,
    private readonly options: EntryWriterOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  logFileFor(project: Project): LogFileInfo {
    const date = formatLocalDate(this.now());
    const base = project.logRepo ?? this.options.inPlaceRoot;
    return {
      filePath: path.join(base, project.name, `${date}.md`),
      logRepo: project.logRepo,
      date,
    };
  }

  async commit(project: Project, entry: LogEntry): Promise<WriteOutcome> {
    const prefix = entry.section === OTHER_SECTION
      ? `Add manual entry to ${project.name} logs`
      : `Update ${project.name} logs`;
    return this.update(project, log => applyEntry(log, entry), prefix);
  }

  async commitBroken(project: Project, text: string): Promise<WriteOutcome> {
    return this.update(project, log => applyBrokenEntry(log, text), `Add what-broke entry to ${project.name} logs`);
  }

  private async update(
    project: Project,
    transform: (log: DailyLog) => ApplyResult,
    commitMessagePrefix: string,
  ): Promise<WriteOutcome> {
    const info = this.logFileFor(project);

    // Load right before writing to keep the window for concurrent writers small
    const current = await this.store.load(info.filePath);
    const result = transform(current);
    if (result.outcome === 'duplicate') {
      return { status: 'duplicate', filePath: info.filePath, published: null };
    }

    await this.store.save(info.filePath, result.log);

    if (!info.logRepo) {
      return { status: 'added', filePath: info.filePath, published: null };
    }

    const published = await this.publish(info.logRepo, info.filePath, `${commitMessagePrefix} for ${info.date}`);
    return { status: 'added', filePath: info.filePath, published };
  }

  private async publish(logRepo: string, filePath: string, message: string): Promise<PublishResult> {
    let result: PublishResult;
    try {
      result = await this.publisher.commitAndPush(logRepo, filePath, message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[EntryWriter] Publishing ${filePath} failed: ${reason}`);
      return { success: false, error: new PublishError(reason, error) };
    }
    if (!result.success) {
      console.warn(`[EntryWriter] Publishing ${filePath} failed: ${result.error.message}`);
    }
    return result;
  }
}
