import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Config, Project } from '../core/types/daylog';
import { normalizePath } from '../core/paths';

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

const optionalPath = z.string().trim().min(1).nullish();

const projectEntrySchema = z.union([
  z.string().trim().min(1),
  z.object({
    root: optionalPath,
    log_repo: optionalPath,
  }),
]).nullable();

const configFileSchema = z.object({
  global_log_repo: optionalPath,
  projects: z.record(projectEntrySchema).nullish(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export const EMPTY_CONFIG: Config = Object.freeze({ projects: new Map<string, Project>() });

/**
 * Build the immutable Config from a validated config document.
 * Projects without a root are skipped.
 */
export function buildConfig(data: ConfigFile): Config {
  const projects = new Map<string, Project>();
  for (const [name, entry] of Object.entries(data.projects ?? {})) {
    const root = typeof entry === 'string' ? entry : entry?.root;
    if (!root) {
      console.warn(`[Config] Project "${name}" has no root, ignoring it.`);
      continue;
    }
    const logRepo = typeof entry === 'object' && entry?.log_repo ? normalizePath(entry.log_repo) : undefined;
    projects.set(name, Object.freeze({ name, root: normalizePath(root), logRepo }));
  }

  return Object.freeze({
    globalLogRepo: data.global_log_repo ? normalizePath(data.global_log_repo) : undefined,
    projects,
  });
}

/**
 * Parse and validate YAML config text. Throws ConfigError on bad input.
 */
export function parseConfig(content: string): Config {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, error);
  }
  // An empty document is an empty configuration
  if (raw === undefined || raw === null) return EMPTY_CONFIG;

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
  }
  return buildConfig(parsed.data);
}

/**
 * Load the configuration file. A missing, unreadable or invalid file
 * degrades to the empty configuration so commits are never blocked.
 */
export function loadConfig(configPath: string): Config {
  if (!fs.existsSync(configPath)) {
    return EMPTY_CONFIG;
  }

  try {
    return parseConfig(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Config] Ignoring ${configPath}: ${message}`);
    return EMPTY_CONFIG;
  }
}
