import type { Config, PublishAgent, VersionControl } from './core/types/daylog';
import type { Settings } from './config/settings';
import { loadConfig } from './config/configLoader';
import { LocalGitAdapter } from './adapters/localGitAdapter';
import { GitPublisher } from './adapters/gitPublisher';
import { LogStore } from './core/logStore';
import { EntryWriter } from './core/entryWriter';
import { JournalService } from './services/journalService';
import { spawnCommand, type CommandRunner } from './hooks/commandRunner';
import type { HookStep } from './hooks/hookDispatcher';
import { aggregationStep, chainedHookStep, preCommitStep } from './hooks/hookSteps';

export interface Runtime {
  settings: Settings;
  config: Config;
  vcs: VersionControl;
  journal: JournalService;
  hookSteps: HookStep[];
}

export interface RuntimeOverrides {
  config?: Config;
  publisher?: PublishAgent;
  vcs?: VersionControl;
  runner?: CommandRunner;
  now?: () => Date;
}

/**
 * Wire every collaborator once, from settings and the loaded configuration.
 */
export function createRuntime(settings: Settings, overrides: RuntimeOverrides = {}): Runtime {
  const config = overrides.config ?? loadConfig(settings.configPath);
  const vcs = overrides.vcs ?? new LocalGitAdapter();
  const publisher = overrides.publisher ?? new GitPublisher({ author: settings.author, push: settings.push });
  const writer = new EntryWriter(new LogStore(), publisher, { inPlaceRoot: settings.inPlaceRoot, now: overrides.now });
  const journal = new JournalService(config, vcs, writer);
  const runner = overrides.runner ?? spawnCommand;

  return {
    settings,
    config,
    vcs,
    journal,
    hookSteps: [
      chainedHookStep(runner),
      preCommitStep(runner, settings.preCommitBin),
      aggregationStep(journal, vcs),
    ],
  };
}
