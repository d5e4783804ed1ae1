import type { SwitchResult } from '@envswitch/contracts';
import type { ZodError } from 'zod';

export type SwitchErrorCode =
  | 'ERR_INVALID_ENVIRONMENT'
  | 'ERR_INVALID_OPTIONS'
  | 'ERR_DEPENDENCY_RESOLUTION'
  | 'ERR_HOOK_REJECTED'
  | 'ERR_HOOK_FAILED'
  | 'ERR_NO_SWITCHER'
  | 'ERR_NO_CONFIGURATION'
  | 'ERR_STATE_CAPTURE'
  | 'ERR_SWITCH_FAILED'
  | 'ERR_SWITCH_CANCELLED';

export const ERROR_HINTS: Record<SwitchErrorCode, string> = {
  ERR_INVALID_ENVIRONMENT: 'Check the environment name, services and dependency entries',
  ERR_INVALID_OPTIONS: 'timeoutMs must be a positive number and maxConcurrency a positive integer',
  ERR_DEPENDENCY_RESOLUTION: 'Dependencies must read "from -> to", name known services and form no cycle',
  ERR_HOOK_REJECTED: 'Hooks may only use plain commands; chaining, substitution and privileged commands are refused',
  ERR_HOOK_FAILED: 'Check the hook output above, or set onError: continue to make it non-fatal',
  ERR_NO_SWITCHER: 'Register a capability under the service name before switching',
  ERR_NO_CONFIGURATION: 'Add the configuration block the registered capability consumes to the service entry',
  ERR_STATE_CAPTURE: 'The current state could not be read; check the service CLI is installed and logged in',
  ERR_SWITCH_FAILED: 'Check the errors list of the result for the failing services',
  ERR_SWITCH_CANCELLED: 'Increase timeoutMs or check what aborted the switch',
};

/**
 * Terminal error of `switchEnvironment`. The failed result is attached so
 * callers see which services switched, failed and were rolled back.
 */
export class EnvironmentSwitchError extends Error {
  readonly code: SwitchErrorCode;
  readonly hint: string;
  readonly result: SwitchResult;

  constructor(code: SwitchErrorCode, message: string, result: SwitchResult, cause?: unknown) {
    super(message, { cause });
    this.name = 'EnvironmentSwitchError';
    this.code = code;
    this.hint = ERROR_HINTS[code];
    this.result = result;
  }
}

export type DependencyErrorCode =
  | 'ERR_DEPENDENCY_FORMAT'
  | 'ERR_UNKNOWN_SERVICE'
  | 'ERR_CIRCULAR_DEPENDENCY';

export class DependencyResolutionError extends Error {
  readonly code: DependencyErrorCode;

  constructor(code: DependencyErrorCode, message: string) {
    super(message);
    this.name = 'DependencyResolutionError';
    this.code = code;
  }
}

/** An environment file or document that does not match the schema. */
export class EnvironmentConfigError extends Error {
  /** `path: message` per schema issue */
  readonly issues: string[];
  readonly source: string | undefined;

  constructor(message: string, issues: string[] = [], source?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EnvironmentConfigError';
    this.issues = issues;
    this.source = source;
  }
}

export class RegistryLockedError extends Error {
  constructor(name: string) {
    super(`cannot register "${name}" while a switch is in progress`);
    this.name = 'RegistryLockedError';
  }
}

/** `path: message` per issue; the document root is written `(root)`. */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
