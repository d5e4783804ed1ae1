import { logger } from '@envswitch/adapters/logging';
import { CommandError, runCommand, type CommandRunner } from '@envswitch/adapters/shell';
import { describeError, type Hook } from '@envswitch/contracts';
import { validateHookCommand } from './hook-gate';

export type HookPhase = 'pre' | 'post';

export class HookError extends Error {
  readonly code: 'ERR_HOOK_REJECTED' | 'ERR_HOOK_FAILED';
  readonly hookName: string;

  constructor(code: HookError['code'], hookName: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'HookError';
    this.code = code;
    this.hookName = hookName;
  }
}

export interface HookRunOptions {
  signal: AbortSignal;
  /** used when a hook sets no timeout, or 0 */
  defaultTimeoutMs: number;
  run?: CommandRunner;
}

export function hookName(phase: HookPhase, index: number): string {
  return `${phase}-hook-${index}`;
}

/**
 * Gate, then run one hook through the shell. Throws HookError naming the hook.
 */
export async function executeHook(hook: Hook, name: string, opts: HookRunOptions): Promise<void> {
  const check = validateHookCommand(hook.command);
  if (!check.ok) {
    throw new HookError('ERR_HOOK_REJECTED', name, `hook '${name}' validation failed: ${check.reason}`);
  }

  const run = opts.run ?? runCommand;
  const timeoutMs = hook.timeoutMs || opts.defaultTimeoutMs;

  logger.debug('running hook', { hook: name, timeoutMs });
  try {
    await run(hook.command, { timeoutMs, signal: opts.signal });
  } catch (err) {
    const output = err instanceof CommandError ? err.output.trim() : '';
    const message = output
      ? `hook '${name}' failed: ${describeError(err)} (output: ${output})`
      : `hook '${name}' failed: ${describeError(err)}`;
    throw new HookError('ERR_HOOK_FAILED', name, message, err);
  }
}

/**
 * Run hooks in order. A failing hook with `onError: continue` is logged and
 * returned in the list; any other failure is thrown and stops the phase.
 */
export async function executeHooks(
  hooks: readonly Hook[],
  phase: HookPhase,
  opts: HookRunOptions,
): Promise<HookError[]> {
  const skipped: HookError[] = [];
  for (const [index, hook] of hooks.entries()) {
    try {
      await executeHook(hook, hookName(phase, index), opts);
    } catch (err) {
      if (err instanceof HookError && hook.onError === 'continue') {
        logger.warn('hook failed, continuing', { hook: err.hookName, error: err.message });
        skipped.push(err);
        continue;
      }
      throw err;
    }
  }
  return skipped;
}
