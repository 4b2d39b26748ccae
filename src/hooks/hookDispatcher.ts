export const HOOK_EVENTS = ['pre-commit', 'commit-msg', 'post-commit', 'pre-push'] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

export function isHookEvent(value: string): value is HookEvent {
  return HOOK_EVENTS.some(event => event === value);
}

export type FailurePolicy = 'abort-on-failure' | 'warn-on-failure';

export interface HookContext {
  event: HookEvent;
  args: string[]; // Arguments git passed to the hook
  repoRoot: string;
  hooksDir: string;
}

export interface HookStep {
  name: string;
  policy: FailurePolicy;
  run(context: HookContext): Promise<number>;
}

export type StepStatus = 'ok' | 'failed' | 'warned';

export interface StepReport {
  name: string;
  status: StepStatus;
  exitCode: number;
  error?: string;
}

export interface DispatchResult {
  exitCode: number;
  reports: StepReport[];
}

/**
 * Run hook steps in order. A failing abort-on-failure step stops the chain
 * and its exit code becomes the hook's; a failing warn-on-failure step is
 * reported on stderr and the chain carries on.
 */
export async function dispatchHook(steps: HookStep[], context: HookContext): Promise<DispatchResult> {
  const reports: StepReport[] = [];

  for (const step of steps) {
    let exitCode: number;
    let errorMessage: string | undefined;
    try {
      exitCode = await step.run(context);
    } catch (error) {
      exitCode = 1;
      errorMessage = error instanceof Error ? error.message : String(error);
    }

    if (exitCode === 0) {
      reports.push({ name: step.name, status: 'ok', exitCode });
      continue;
    }

    if (step.policy === 'abort-on-failure') {
      if (errorMessage) {
        console.error(`[HookDispatcher] ${step.name} failed: ${errorMessage}`);
      }
      reports.push({ name: step.name, status: 'failed', exitCode, error: errorMessage });
      return { exitCode, reports };
    }

    console.error(`[HookDispatcher] Warning: ${step.name} failed (${errorMessage ?? `exit code ${exitCode}`}); continuing.`);
    reports.push({ name: step.name, status: 'warned', exitCode, error: errorMessage });
  }

  return { exitCode: 0, reports };
}
