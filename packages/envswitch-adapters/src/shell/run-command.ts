import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import { logger } from '../logging/logger';

export type RunCommandOptions = {
  /** Arguments for `cmd`; when given the command is spawned directly, without a shell. */
  args?: string[];
  /** resolve instead of rejecting on a non-zero exit code */
  allowFail?: boolean;
  /** kill the process after this many ms */
  timeoutMs?: number;
  /** kill the process when aborted */
  signal?: AbortSignal;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  output: string;
};

export type CommandRunner = (cmd: string, opts?: RunCommandOptions) => Promise<CommandResult>;

export class CommandError extends Error {
  readonly command: string;
  readonly code: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly output: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: {
      command: string;
      code: number | null;
      stdout?: string;
      stderr?: string;
      output?: string;
      timedOut?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { cause: details.cause });
    this.name = 'CommandError';
    this.command = details.command;
    this.code = details.code;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
    this.output = details.output ?? '';
    this.timedOut = details.timedOut ?? false;
  }
}

function describeCommand(cmd: string, args?: string[]): string {
  return args && args.length > 0 ? `${cmd} ${args.join(' ')}` : cmd;
}

/**
 * Run a command and collect its output.
 * The child inherits this process's working directory and environment.
 * Without `args` the string goes through the shell (`/bin/sh -c` on POSIX).
 * Rejects with CommandError on a non-zero exit, a timeout or an abort, unless allowFail is set
 * (timeouts and aborts always reject).
 */
export function runCommand(cmd: string, opts: RunCommandOptions = {}): Promise<CommandResult> {
  const { args, allowFail = false, timeoutMs, signal } = opts;
  const command = describeCommand(cmd, args);

  logger.debug('runCommand start', { cmd: command });

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CommandError(`Command aborted before start: ${command}`, { command, code: null, cause: signal.reason }));
      return;
    }

    const spawnOpts: SpawnOptions = {
      shell: args === undefined,
      stdio: 'pipe',
    };

    const child = spawn(cmd, args ?? [], spawnOpts);

    let stdout = '';
    let stderr = '';
    let output = '';
    let timedOut = false;
    let aborted = false;

    child.stdout?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stdout += text;
      output += text;
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stderr += text;
      output += text;
    });

    let timer: NodeJS.Timeout | undefined;
    if (timeoutMs && timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        logger.warn('runCommand timeout, killing process', { cmd: command, timeoutMs });
        child.kill('SIGKILL');
      }, timeoutMs);
    }

    const onAbort = (): void => {
      aborted = true;
      logger.warn('runCommand aborted, killing process', { cmd: command });
      child.kill('SIGKILL');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      if (timer) { clearTimeout(timer); }
      signal?.removeEventListener('abort', onAbort);
    };

    child.on('error', (err) => {
      cleanup();
      logger.error('runCommand error', { cmd: command, err });
      reject(new CommandError(`Command could not be started: ${command}: ${err.message}`, {
        command, code: null, stdout, stderr, output, cause: err,
      }));
    });

    child.on('close', (code) => {
      cleanup();
      logger.debug('runCommand done', { cmd: command, code, stdoutLen: stdout.length, stderrLen: stderr.length });

      if (timedOut) {
        reject(new CommandError(`Command timed out after ${timeoutMs}ms: ${command}`, {
          command, code, stdout, stderr, output, timedOut: true,
        }));
        return;
      }
      if (aborted) {
        reject(new CommandError(`Command aborted: ${command}`, {
          command, code, stdout, stderr, output, cause: signal?.reason,
        }));
        return;
      }
      if (code === 0 || allowFail) {
        resolve({ code: code ?? 0, stdout, stderr, output });
        return;
      }
      reject(new CommandError(`Command failed (${code}): ${command}`, {
        command, code, stdout, stderr, output,
      }));
    });
  });
}
