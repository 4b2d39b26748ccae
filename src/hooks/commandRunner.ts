import { spawnSync } from 'child_process';

export interface CommandResult {
  status: number | null;
  error?: NodeJS.ErrnoException;
}

export interface CommandOptions {
  cwd: string;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => CommandResult;

/**
 * Run a command attached to the hook's own stdio, so tools can prompt
 * and read refs from stdin as they would when git calls them directly.
 */
export const spawnCommand: CommandRunner = (command, args, options) => {
  const result = spawnSync(command, args, { cwd: options.cwd, stdio: 'inherit' });
  return { status: result.status, error: result.error };
};
