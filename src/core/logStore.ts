import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { DailyLog, ParseResult } from './types/daylog';

export const HEADER_MARKER = '# What I did';
export const NEXT_MARKER = '# Whats next';
export const BROKEN_MARKER = '# What Broke or Got Weird';
export const SECTION_PREFIX = '## ';
export const OTHER_SECTION = 'other';

const DEFAULT_FOOTER = `${NEXT_MARKER}\n\n\n${BROKEN_MARKER}`;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function createSkeleton(): DailyLog {
  return {
    preamble: '',
    sections: new Map(),
    footer: DEFAULT_FOOTER,
    broken: [],
  };
}

function isLevelOneHeading(line: string): boolean {
  return line.startsWith('# ');
}

function pushUnique(list: string[], line: string): void {
  if (!list.includes(line)) list.push(line);
}

/**
 * Split the trailer into the literal footer (up to and including the
 * "What Broke" marker) and the entries listed below that marker.
 */
function parseFooter(lines: string[]): { footer: string; broken: string[] } {
  const markerIndex = lines.findIndex(line => line.trim() === BROKEN_MARKER);
  if (markerIndex === -1) {
    const kept = [...lines];
    while (kept.length > 0 && kept[kept.length - 1].trim() === '') kept.pop();
    const footer = kept.length > 0 ? `${kept.join('\n')}\n\n${BROKEN_MARKER}` : DEFAULT_FOOTER;
    return { footer, broken: [] };
  }

  const broken: string[] = [];
  for (const line of lines.slice(markerIndex + 1)) {
    const entry = line.trim();
    if (entry) pushUnique(broken, entry);
  }
  return { footer: lines.slice(0, markerIndex).concat(BROKEN_MARKER).join('\n'), broken };
}

export function parseDailyLog(content: string): ParseResult {
  const lines = content.replace(/\r\n/g, '\n').split('\n');
  // A heading that merely extends the marker ("# What I did today") still counts
  const headerIndex = lines.findIndex(line => line.trim().startsWith(HEADER_MARKER));
  if (headerIndex === -1) {
    return { kind: 'skeleton', reason: 'unrecognized' };
  }

  let footerIndex = lines.findIndex((line, i) => i > headerIndex && isLevelOneHeading(line));
  if (footerIndex === -1) footerIndex = lines.length;

  const sections = new Map<string, string[]>();
  let current: string[] | undefined;
  for (const rawLine of lines.slice(headerIndex + 1, footerIndex)) {
    const line = rawLine.trim();
    if (line.startsWith(SECTION_PREFIX) || line === SECTION_PREFIX.trim()) {
      const name = line.slice(SECTION_PREFIX.length).trim();
      if (!name) {
        current = undefined;
        continue;
      }
      current = sections.get(name);
      if (!current) {
        current = [];
        sections.set(name, current);
      }
    } else if (line && current) {
      pushUnique(current, line);
    }
  }

  const preamble = headerIndex > 0 ? `${lines.slice(0, headerIndex).join('\n')}\n` : '';
  const { footer, broken } = parseFooter(lines.slice(footerIndex));
  return { kind: 'parsed', log: { preamble, sections, footer, broken } };
}

export function compareSectionNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Section names in output order: case-insensitive alphabetical, "other" last.
 */
export function orderSections(names: Iterable<string>): string[] {
  const sorted = [...names].filter(name => name !== OTHER_SECTION).sort(compareSectionNames);
  if ([...names].includes(OTHER_SECTION)) sorted.push(OTHER_SECTION);
  return sorted;
}

export function serializeDailyLog(log: DailyLog): string {
  const body: string[] = [];
  for (const name of orderSections(log.sections.keys())) {
    const entries = log.sections.get(name) ?? [];
    if (entries.length === 0) continue;
    body.push(`${SECTION_PREFIX}${name}`, ...entries, '');
  }

  const main = body.length > 0 ? `${body.join('\n').trimEnd()}\n\n` : '\n';
  const broken = log.broken.map(line => `${line}\n`).join('');
  return `${log.preamble}${HEADER_MARKER}\n\n${main}${log.footer}\n${broken}`;
}

/**
 * Reads and writes daily log files. Reading never throws; writing is
 * atomic (temporary file in the same directory, then rename).
 */
export class LogStore {
  async read(filePath: string): Promise<ParseResult> {
    let content: string;
    try {
      content = utf8.decode(await fs.promises.readFile(filePath));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { kind: 'skeleton', reason: 'missing' };
      }
      console.warn(`[LogStore] Could not read ${filePath}, starting a fresh log: ${error instanceof Error ? error.message : String(error)}`);
      return { kind: 'skeleton', reason: 'unreadable' };
    }

    const result = parseDailyLog(content);
    if (result.kind === 'skeleton') {
      console.warn(`[LogStore] ${filePath} has no "${HEADER_MARKER}" header, rebuilding it.`);
    }
    return result;
  }

  async load(filePath: string): Promise<DailyLog> {
    const result = await this.read(filePath);
    return result.kind === 'parsed' ? result.log : createSkeleton();
  }

  async save(filePath: string, log: DailyLog): Promise<void> {
    const directory = path.dirname(filePath);
    await fs.promises.mkdir(directory, { recursive: true });

    const tempPath = path.join(directory, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
    try {
      await fs.promises.writeFile(tempPath, serializeDailyLog(log), 'utf8');
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }
}
