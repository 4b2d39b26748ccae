import { Command, CommanderError } from 'commander';
import type { Runtime } from './runtime';
import { dispatchHook, HOOK_EVENTS, isHookEvent, type HookEvent } from './hooks/hookDispatcher';
import { DEFAULT_EVENTS, installHooks } from './hooks/hookInstaller';
import { normalizeText } from './core/entryWriter';

export interface CliContext {
  getRuntime: () => Runtime;
  cwd: () => string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseEvents(values: string[] | undefined): HookEvent[] {
  if (!values || values.length === 0) return DEFAULT_EVENTS;
  return values.map(value => {
    if (!isHookEvent(value)) {
      throw new Error(`Unknown hook event "${value}" (expected one of: ${HOOK_EVENTS.join(', ')})`);
    }
    return value;
  });
}

export function buildProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('daylog')
    .description('Collect commit messages and notes into daily markdown logs')
    .version('0.1.0')
    .exitOverride();

  program
    .command('hook')
    .description('Run the hook chain for a git event (called from hook scripts)')
    .argument('<event>', `one of ${HOOK_EVENTS.join(', ')}`)
    .argument('[args...]', 'arguments git passed to the hook')
    .option('--hooks-dir <dir>', 'directory holding the hook scripts')
    .action(async (event: string, args: string[], options: { hooksDir?: string }) => {
      if (!isHookEvent(event)) {
        console.error(`[daylog] Unknown hook event "${event}", nothing to do.`);
        setExitCode(0);
        return;
      }
      let runtime: Runtime;
      try {
        runtime = context.getRuntime();
      } catch (error) {
        // Without a runtime there is nothing to gate on; never block the commit
        console.error(`[daylog] Warning: could not start: ${describeError(error)}`);
        setExitCode(0);
        return;
      }
      const cwd = context.cwd();
      let repoRoot = cwd;
      try {
        repoRoot = (await runtime.vcs.findRepoRoot(cwd)) ?? cwd;
      } catch (error) {
        console.warn(`[daylog] Could not locate the repository root: ${describeError(error)}`);
      }

      const result = await dispatchHook(runtime.hookSteps, {
        event,
        args,
        repoRoot,
        hooksDir: options.hooksDir ?? runtime.settings.hooksDir,
      });
      setExitCode(result.exitCode);
    });

  program
    .command('btw')
    .description('Add a note to today\'s log under "other"')
    .argument('<text...>', 'the note; words are joined with spaces')
    .action(async (words: string[]) => {
      const text = words.join(' ');
      if (!normalizeText(text)) {
        console.error('Error: Entry text cannot be empty');
        setExitCode(1);
        return;
      }
      const outcome = await context.getRuntime().journal.addNote(context.cwd(), text);
      console.log(outcome.status === 'added'
        ? `Added entry to ${outcome.project.name} log: ${normalizeText(text)}`
        : `Entry already exists in ${outcome.project.name} log: ${normalizeText(text)}`);
    });

  program
    .command('wtf')
    .description('Add a note under "What Broke or Got Weird"')
    .argument('<text...>', 'what broke; words are joined with spaces')
    .action(async (words: string[]) => {
      const text = words.join(' ');
      if (!normalizeText(text)) {
        console.error('Error: Entry text cannot be empty');
        setExitCode(1);
        return;
      }
      const outcome = await context.getRuntime().journal.addBroken(context.cwd(), text);
      console.log(outcome.status === 'added'
        ? `Added what-broke entry to ${outcome.project.name} log: ${normalizeText(text)}`
        : `Entry already exists in ${outcome.project.name} log: ${normalizeText(text)}`);
    });

  program
    .command('commit')
    .description('Record a commit explicitly')
    .argument('<message...>', 'commit message')
    .option('--repo <path>', 'repository the commit was made in')
    .option('--ref <sha>', 'commit hash')
    .action(async (words: string[], options: { repo?: string; ref?: string }) => {
      const outcome = await context.getRuntime().journal.recordCommit({
        cwd: options.repo ?? context.cwd(),
        message: words.join(' '),
        commitRef: options.ref,
      });
      if (outcome.status === 'skipped') {
        console.log(`Not logged: ${outcome.reason}`);
      } else {
        console.log(`${outcome.status === 'added' ? 'Logged to' : 'Already in'} ${outcome.filePath}`);
      }
    });

  program
    .command('where')
    .description('Show the project and log file for the current directory')
    .action(async () => {
      const { project, file } = await context.getRuntime().journal.locate(context.cwd());
      console.log(`project:  ${project.name}`);
      console.log(`root:     ${project.root}`);
      console.log(`log repo: ${project.logRepo ?? '(none, logs stay local)'}`);
      console.log(`log file: ${file.filePath}`);
    });

  program
    .command('install')
    .description('Install dispatcher scripts into a hooks directory')
    .option('--hooks-dir <dir>', 'target hooks directory')
    .option('--event <event...>', `events to install (default: ${DEFAULT_EVENTS.join(', ')})`)
    .option('--command <command>', 'command the scripts run', 'daylog')
    .option('--global', 'point git\'s global core.hooksPath at the hooks directory')
    .action((options: { hooksDir?: string; event?: string[]; command: string; global?: boolean }) => {
      const result = installHooks({
        hooksDir: options.hooksDir ?? context.getRuntime().settings.hooksDir,
        events: parseEvents(options.event),
        command: options.command,
        setGlobalHooksPath: options.global === true,
      });
      for (const hook of result.hooks) {
        const extra = hook.chainedPath ? ` (previous hook kept as ${hook.chainedPath})` : '';
        console.log(`${hook.event}: ${hook.action}${extra}`);
      }
      if (result.hooksPathChanged) {
        console.log('Global core.hooksPath updated.');
      }
    });

  return program;
}

/**
 * Parse argv and run the matching command. Resolves to the exit code.
 */
export async function run(argv: string[], context: CliContext): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(context, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    console.error(`Error: ${describeError(error)}`);
    return 1;
  }
  return exitCode;
}
