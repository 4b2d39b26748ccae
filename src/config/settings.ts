import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { expandHome } from '../core/paths';

export interface Settings {
  home: string;
  configPath: string;
  inPlaceRoot: string; // Where logs live for projects without a log repository
  hooksDir: string;
  push: boolean;
  preCommitBin: string;
  author?: { name: string; email: string };
}

type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function resolveHome(env: Env): string {
  return path.resolve(expandHome(env.DAYLOG_HOME || path.join(os.homedir(), '.daylog')));
}

/**
 * Load `$DAYLOG_HOME/.env` into process.env. Variables already set win.
 */
export function loadEnvFile(env: Env = process.env): void {
  const envFile = path.join(resolveHome(env), '.env');
  const result = dotenv.config({ path: envFile });
  const error = result.error;
  if (error && !('code' in error && error.code === 'ENOENT')) {
    console.warn(`[Settings] Could not read ${envFile}: ${error.message}`);
  }
}

export function loadSettings(env: Env = process.env): Settings {
  const home = resolveHome(env);
  const resolveOr = (value: string | undefined, fallback: string) =>
    path.resolve(expandHome(value || fallback));

  const settings: Settings = {
    home,
    configPath: resolveOr(env.DAYLOG_CONFIG, path.join(home, 'config.yml')),
    inPlaceRoot: resolveOr(env.DAYLOG_LOG_ROOT, path.join(home, 'projects')),
    hooksDir: resolveOr(env.DAYLOG_HOOKS_DIR, path.join(os.homedir(), '.git-hooks')),
    push: !TRUTHY.has((env.DAYLOG_NO_PUSH || '').toLowerCase()),
    preCommitBin: env.DAYLOG_PRE_COMMIT || 'pre-commit',
  };

  if (env.DAYLOG_AUTHOR_NAME) {
    settings.author = {
      name: env.DAYLOG_AUTHOR_NAME,
      email: env.DAYLOG_AUTHOR_EMAIL || 'daylog@localhost',
    };
  }
  return settings;
}
