import { describe, it, expect, vi } from "vitest";
import { CommandError, type CommandResult, type CommandRunner } from "@envswitch/adapters/shell";
import { executeHook, executeHooks, HookError } from "../hooks";

const ok: CommandResult = { code: 0, stdout: "", stderr: "", output: "" };

function fakeRunner(impl: CommandRunner = async () => ok) {
  return vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(impl);
}

function failure(command: string): CommandError {
  return new CommandError(`Command failed (1): ${command}`, {
    command,
    code: 1,
    output: "no such profile\n",
  });
}

const signal = new AbortController().signal;

describe("executeHook", () => {
  it("should run the command with the hook timeout and the switch signal", async () => {
    const run = fakeRunner();

    await executeHook({ command: "echo ready", timeoutMs: 500 }, "pre-hook-0", {
      signal,
      defaultTimeoutMs: 30000,
      run,
    });

    expect(run).toHaveBeenCalledWith("echo ready", { timeoutMs: 500, signal });
  });

  it("should fall back to the default timeout", async () => {
    const run = fakeRunner();

    await executeHook({ command: "echo ready", timeoutMs: 0 }, "pre-hook-0", {
      signal,
      defaultTimeoutMs: 1234,
      run,
    });

    expect(run.mock.calls[0]?.[1]?.timeoutMs).toBe(1234);
  });

  it("should never run a rejected command", async () => {
    const run = fakeRunner();

    const err = await executeHook({ command: "echo $(id)" }, "post-hook-2", {
      signal,
      defaultTimeoutMs: 30000,
      run,
    }).catch((e: unknown) => e);

    expect(run).not.toHaveBeenCalled();
    expect(err).toBeInstanceOf(HookError);
    if (err instanceof HookError) {
      expect(err.code).toBe("ERR_HOOK_REJECTED");
      expect(err.hookName).toBe("post-hook-2");
      expect(err.message).toBe(
        "hook 'post-hook-2' validation failed: hook command contains potentially dangerous pattern: $(",
      );
    }
  });

  it("should include the command output in the failure", async () => {
    const run = fakeRunner(async () => {
      throw failure("aws sts get-caller-identity");
    });

    await expect(
      executeHook({ command: "aws sts get-caller-identity" }, "pre-hook-1", {
        signal,
        defaultTimeoutMs: 30000,
        run,
      }),
    ).rejects.toThrow(
      "hook 'pre-hook-1' failed: Command failed (1): aws sts get-caller-identity (output: no such profile)",
    );
  });
});

describe("executeHooks", () => {
  it("should skip failing hooks marked continue and report them", async () => {
    const run = fakeRunner(async (cmd) => {
      if (cmd === "false") {
        throw failure(cmd);
      }
      return ok;
    });

    const skipped = await executeHooks(
      [{ command: "false", onError: "continue" }, { command: "echo after" }],
      "pre",
      { signal, defaultTimeoutMs: 30000, run },
    );

    expect(skipped.map((e) => e.hookName)).toEqual(["pre-hook-0"]);
    expect(run.mock.calls.map(([cmd]) => cmd)).toEqual(["false", "echo after"]);
  });

  it("should stop at the first failing hook without a continue policy", async () => {
    const run = fakeRunner(async () => {
      throw failure("false");
    });

    await expect(
      executeHooks([{ command: "false", onError: "fail" }, { command: "echo never" }], "post", {
        signal,
        defaultTimeoutMs: 30000,
        run,
      }),
    ).rejects.toMatchObject({ code: "ERR_HOOK_FAILED", hookName: "post-hook-0" });
    expect(run).toHaveBeenCalledTimes(1);
  });
});
