import fs from 'fs';
import path from 'path';
import { execFileSync } from 'child_process';
import type { HookEvent } from './hookDispatcher';
import { CHAINED_SUFFIX } from './hookSteps';

export const DISPATCHER_MARKER = '# daylog hook dispatcher';

export const DEFAULT_EVENTS: HookEvent[] = ['pre-commit', 'commit-msg', 'post-commit', 'pre-push'];

export type InstallAction = 'installed' | 'updated' | 'chained' | 'skipped';

export interface InstallReport {
  event: HookEvent;
  action: InstallAction;
  path: string;
  chainedPath?: string;
  reason?: string;
}

export interface GitConfigAccess {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

export interface InstallOptions {
  hooksDir: string;
  events?: HookEvent[];
  command?: string; // How the script invokes us; defaults to "daylog"
  setGlobalHooksPath?: boolean;
  gitConfig?: GitConfigAccess;
}

export interface InstallResult {
  hooks: InstallReport[];
  hooksPathChanged: boolean;
}

function shellQuote(value: string): string {
  return /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * The dispatcher hands the event to daylog. When the command cannot be
 * found it falls back to the chained hook alone, and otherwise lets git go on.
 * Only shell builtins run before the command is known to exist.
 */
export function renderDispatcherScript(event: HookEvent, command: string): string {
  const quoted = shellQuote(command);
  return [
    '#!/bin/sh',
    DISPATCHER_MARKER,
    'hooks_dir=${0%/*}',
    `if ! command -v ${quoted} >/dev/null 2>&1; then`,
    `  echo "daylog: command not found, skipping the ${event} log entry" >&2`,
    `  if [ -x "$hooks_dir/${event}${CHAINED_SUFFIX}" ]; then`,
    `    exec "$hooks_dir/${event}${CHAINED_SUFFIX}" "$@"`,
    '  fi',
    '  exit 0',
    'fi',
    `exec ${quoted} hook ${event} --hooks-dir "$hooks_dir" -- "$@"`,
    '',
  ].join('\n');
}

/**
 * Global git config through the git CLI.
 */
export const globalGitConfig: GitConfigAccess = {
  get(key) {
    try {
      const value = execFileSync('git', ['config', '--global', key], { stdio: 'pipe' }).toString().trim();
      return value || undefined;
    } catch {
      // git config exits 1 when the key is unset
      return undefined;
    }
  },
  set(key, value) {
    execFileSync('git', ['config', '--global', key, value], { stdio: 'pipe' });
  },
};

function installOne(hooksDir: string, event: HookEvent, script: string): InstallReport {
  const target = path.join(hooksDir, event);
  const chained = `${target}${CHAINED_SUFFIX}`;

  if (!fs.existsSync(target)) {
    fs.writeFileSync(target, script, { mode: 0o755 });
    return { event, action: 'installed', path: target };
  }

  const current = fs.readFileSync(target, 'utf8');
  if (current.includes(DISPATCHER_MARKER)) {
    fs.writeFileSync(target, script, { mode: 0o755 });
    fs.chmodSync(target, 0o755);
    return { event, action: 'updated', path: target };
  }

  if (fs.existsSync(chained)) {
    return {
      event,
      action: 'skipped',
      path: target,
      reason: `both ${target} and ${chained} exist; merge them by hand`,
    };
  }

  fs.renameSync(target, chained);
  fs.writeFileSync(target, script, { mode: 0o755 });
  return { event, action: 'chained', path: target, chainedPath: chained };
}

/**
 * Write dispatcher scripts into a hooks directory. A hook that is already
 * there is moved aside to `<event>.chained` and run by the dispatcher
 * before the daily log is updated.
 */
export function installHooks(options: InstallOptions): InstallResult {
  const hooksDir = path.resolve(options.hooksDir);
  const command = options.command ?? 'daylog';
  fs.mkdirSync(hooksDir, { recursive: true });

  const hooks = (options.events ?? DEFAULT_EVENTS).map(event => {
    const report = installOne(hooksDir, event, renderDispatcherScript(event, command));
    if (report.action === 'skipped') {
      console.warn(`[HookInstaller] Skipping ${event}: ${report.reason}`);
    }
    return report;
  });

  let hooksPathChanged = false;
  if (options.setGlobalHooksPath) {
    const gitConfig = options.gitConfig ?? globalGitConfig;
    if (gitConfig.get('core.hooksPath') !== hooksDir) {
      gitConfig.set('core.hooksPath', hooksDir);
      hooksPathChanged = true;
    }
  }

  return { hooks, hooksPathChanged };
}
