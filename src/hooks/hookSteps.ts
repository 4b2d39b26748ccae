import fs from 'fs';
import path from 'path';
import type { VersionControl } from '../core/types/daylog';
import type { JournalService, RecordOutcome } from '../services/journalService';
import type { CommandRunner } from './commandRunner';
import type { HookContext, HookStep } from './hookDispatcher';

export const CHAINED_SUFFIX = '.chained';
export const PRE_COMMIT_CONFIG = '.pre-commit-config.yaml';

function failureCode(status: number | null): number {
  // Killed by a signal
  return status ?? 1;
}

/**
 * Stage 1: the hook that was installed for this event before ours.
 */
export function chainedHookStep(runner: CommandRunner): HookStep {
  return {
    name: 'chained hook',
    policy: 'abort-on-failure',
    async run(context: HookContext) {
      const script = path.join(context.hooksDir, `${context.event}${CHAINED_SUFFIX}`);
      if (!fs.existsSync(script)) return 0;

      const result = runner(script, context.args, { cwd: context.repoRoot });
      if (result.error) {
        throw new Error(`Could not run ${script}: ${result.error.message}`);
      }
      return failureCode(result.status);
    },
  };
}

/**
 * Stage 1: the pre-commit framework, for repositories that configure it.
 */
export function preCommitStep(runner: CommandRunner, preCommitBin: string): HookStep {
  return {
    name: 'pre-commit',
    policy: 'abort-on-failure',
    async run(context: HookContext) {
      if (!fs.existsSync(path.join(context.repoRoot, PRE_COMMIT_CONFIG))) return 0;

      const args = [
        'hook-impl',
        `--config=${PRE_COMMIT_CONFIG}`,
        `--hook-type=${context.event}`,
        `--hook-dir=${context.hooksDir}`,
        '--skip-on-missing-config',
        '--',
        ...context.args,
      ];
      const result = runner(preCommitBin, args, { cwd: context.repoRoot });
      if (result.error) {
        if (result.error.code === 'ENOENT') {
          console.warn(`[pre-commit] ${PRE_COMMIT_CONFIG} found but "${preCommitBin}" is not installed, skipping.`);
          return 0;
        }
        throw new Error(`Could not run ${preCommitBin}: ${result.error.message}`);
      }
      return failureCode(result.status);
    },
  };
}

function report(outcome: RecordOutcome): void {
  if (outcome.status === 'skipped') {
    console.log(`[daylog] Not logged: ${outcome.reason}`);
  } else if (outcome.status === 'duplicate') {
    console.log(`[daylog] Already in ${outcome.filePath}`);
  } else {
    console.log(`[daylog] Logged to ${outcome.filePath}`);
  }
}

/**
 * Stage 2: record the commit in the daily log. Best effort.
 */
export function aggregationStep(journal: JournalService, vcs: VersionControl): HookStep {
  return {
    name: 'daylog',
    policy: 'warn-on-failure',
    async run(context: HookContext) {
      if (context.event === 'commit-msg') {
        const [messageFile] = context.args;
        if (!messageFile) throw new Error('commit-msg hook called without a message file');
        const message = await fs.promises.readFile(path.resolve(context.repoRoot, messageFile), 'utf8');
        report(await journal.recordCommit({ cwd: context.repoRoot, message }));
      } else if (context.event === 'post-commit') {
        const head = await vcs.readHeadCommit(context.repoRoot);
        if (!head) throw new Error('post-commit hook found no HEAD commit');
        report(await journal.recordCommit({ cwd: context.repoRoot, message: head.message, commitRef: head.oid }));
      }
      return 0;
    },
  };
}
