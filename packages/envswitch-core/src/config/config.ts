import { join } from 'node:path';
import { z } from 'zod';
import { EnvironmentConfigError, formatIssues } from '../errors';

export const DEFAULT_HOOK_TIMEOUT_MS = 30_000;

export interface SwitcherConfig {
  /** timeout for hooks that set none */
  hookTimeoutMs: number;
  /** directories searched for `<name>.yaml` / `<name>.yml`, in order */
  searchPaths: string[];
}

const envSchema = z.object({
  ENVSWITCH_HOOK_TIMEOUT_MS: z
    .string()
    .trim()
    .regex(/^\d*$/, 'must be a whole number of milliseconds')
    .refine((value) => !/^0+$/.test(value), 'must be greater than 0')
    .optional(),
  ENVSWITCH_ENV_DIR: z.string().trim().optional(),
  HOME: z.string().trim().optional(),
});

/**
 * Read runtime settings from environment variables.
 */
export function loadSwitcherConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SwitcherConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new EnvironmentConfigError('invalid envswitch configuration', formatIssues(parsed.error));
  }

  const { ENVSWITCH_HOOK_TIMEOUT_MS, ENVSWITCH_ENV_DIR, HOME } = parsed.data;
  const searchPaths: string[] = [];
  if (ENVSWITCH_ENV_DIR) {
    searchPaths.push(ENVSWITCH_ENV_DIR);
  }
  if (HOME) {
    searchPaths.push(join(HOME, '.envswitch', 'environments'));
  }
  searchPaths.push(join(cwd, 'environments'), cwd);

  return {
    hookTimeoutMs: ENVSWITCH_HOOK_TIMEOUT_MS ? Number(ENVSWITCH_HOOK_TIMEOUT_MS) : DEFAULT_HOOK_TIMEOUT_MS,
    searchPaths,
  };
}
