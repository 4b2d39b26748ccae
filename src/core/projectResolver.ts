import path from 'path';
import type { Config, Project, VersionControl } from './types/daylog';
import { isWithin, normalizePath } from './paths';

/**
 * Find the configured project whose root contains `cwd`.
 * The longest (most specific) root wins; among roots that normalize
 * identically the first declared project is kept.
 */
export function findConfiguredProject(cwd: string, config: Config): Project | undefined {
  const target = normalizePath(cwd);
  let best: { project: Project; depth: number } | undefined;

  for (const project of config.projects.values()) {
    const root = normalizePath(project.root);
    if (!isWithin(root, target)) continue;
    if (!best || root.length > best.depth) {
      best = { project: { ...project, root }, depth: root.length };
    }
  }
  return best?.project;
}

/**
 * Map a working directory to a project. Never fails: unconfigured
 * directories become an ad-hoc project named after their Git repository
 * (or the directory itself outside of a repository).
 */
export async function resolveProject(cwd: string, config: Config, vcs: VersionControl): Promise<Project> {
  const configured = findConfiguredProject(cwd, config);
  if (configured) {
    return {
      name: configured.name,
      root: configured.root,
      logRepo: configured.logRepo ?? config.globalLogRepo,
    };
  }

  const root = normalizePath(cwd);
  let repoRoot: string | undefined;
  try {
    repoRoot = await vcs.findRepoRoot(root);
  } catch (error) {
    console.warn(`[ProjectResolver] Could not look up git repository for ${root}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {
    name: path.basename(repoRoot ?? root) || path.basename(root) || 'root',
    root,
    logRepo: config.globalLogRepo,
  };
}
