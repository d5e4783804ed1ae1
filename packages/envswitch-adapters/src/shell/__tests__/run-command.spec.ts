import { describe, it, expect } from 'vitest';
import { CommandError, runCommand } from '../run-command';

const node = process.execPath;

describe('runCommand', () => {
  it('collects stdout and stderr in arrival order', async () => {
    const result = await runCommand(node, {
      args: ['-e', 'process.stdout.write("out"); setTimeout(() => process.stderr.write("err"), 20)'],
    });

    expect(result).toEqual({ code: 0, stdout: 'out', stderr: 'err', output: 'outerr' });
  });

  it('runs a command string through the shell', async () => {
    const result = await runCommand('echo hello');

    expect(result.stdout).toBe('hello\n');
  });

  it('hands the current environment to the child and pipes its output', async () => {
    process.env.ENVSWITCH_RUN_COMMAND_MARKER = 'from-parent';
    try {
      const result = await runCommand(node, {
        args: ['-e', 'process.stdout.write(String(process.env.ENVSWITCH_RUN_COMMAND_MARKER))'],
      });

      expect(result.output).toBe('from-parent');
    } finally {
      delete process.env.ENVSWITCH_RUN_COMMAND_MARKER;
    }
  });

  it('rejects with the exit code and captured output on failure', async () => {
    const error = await runCommand(node, {
      args: ['-e', 'process.stderr.write("bad things"); process.exit(3)'],
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommandError);
    if (error instanceof CommandError) {
      expect(error.code).toBe(3);
      expect(error.output).toBe('bad things');
      expect(error.timedOut).toBe(false);
    }
  });

  it('resolves a non-zero exit when allowFail is set', async () => {
    const result = await runCommand(node, { args: ['-e', 'process.exit(2)'], allowFail: true });

    expect(result.code).toBe(2);
  });

  it('kills the process after the timeout', async () => {
    const error = await runCommand(node, {
      args: ['-e', 'setTimeout(() => {}, 10000)'],
      timeoutMs: 100,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommandError);
    if (error instanceof CommandError) {
      expect(error.timedOut).toBe(true);
      expect(error.message).toContain('timed out after 100ms');
    }
  });

  it('kills the process when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = runCommand(node, { args: ['-e', 'setTimeout(() => {}, 10000)'], signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    await expect(pending).rejects.toThrow(/^Command aborted: /);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runCommand('echo never', { signal: controller.signal })).rejects.toThrow(
      'Command aborted before start: echo never',
    );
  });
});
