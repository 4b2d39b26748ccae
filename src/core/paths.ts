import fs from 'fs';
import os from 'os';
import path from 'path';

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

/**
 * Absolute path with symlinks resolved (when the path exists) and no trailing separator.
 */
export function normalizePath(p: string): string {
  const absolute = path.resolve(expandHome(p));
  try {
    return fs.realpathSync.native(absolute);
  } catch {
    // Not on disk (yet); the lexical form is the best we have
    return absolute;
  }
}

/**
 * True when `child` is `parent` itself or lies somewhere below it.
 * Both arguments must already be normalized.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/** YYYY-MM-DD in local time. */
export function formatLocalDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
