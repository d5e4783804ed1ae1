import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { loadSwitcherConfig } from "../config";
import { EnvironmentConfigError } from "../../errors";

describe("loadSwitcherConfig", () => {
  it("should use defaults when nothing is set", () => {
    expect(loadSwitcherConfig({}, "/work")).toEqual({
      hookTimeoutMs: 30000,
      searchPaths: [join("/work", "environments"), "/work"],
    });
  });

  it("should search the configured directory first, then home", () => {
    const config = loadSwitcherConfig(
      { ENVSWITCH_ENV_DIR: " /etc/envs ", HOME: "/home/dev", ENVSWITCH_HOOK_TIMEOUT_MS: "1500" },
      "/work",
    );

    expect(config).toEqual({
      hookTimeoutMs: 1500,
      searchPaths: [
        "/etc/envs",
        join("/home/dev", ".envswitch", "environments"),
        join("/work", "environments"),
        "/work",
      ],
    });
  });

  it("should treat empty values as unset", () => {
    expect(loadSwitcherConfig({ ENVSWITCH_HOOK_TIMEOUT_MS: "", ENVSWITCH_ENV_DIR: "" }, "/work")).toEqual({
      hookTimeoutMs: 30000,
      searchPaths: [join("/work", "environments"), "/work"],
    });
  });

  it.each([
    ["30s", "ENVSWITCH_HOOK_TIMEOUT_MS: must be a whole number of milliseconds"],
    ["0", "ENVSWITCH_HOOK_TIMEOUT_MS: must be greater than 0"],
  ])("should reject a hook timeout of %j", (value, issue) => {
    let error: unknown;
    try {
      loadSwitcherConfig({ ENVSWITCH_HOOK_TIMEOUT_MS: value }, "/work");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(EnvironmentConfigError);
    if (error instanceof EnvironmentConfigError) {
      expect(error.issues).toEqual([issue]);
    }
  });
});
