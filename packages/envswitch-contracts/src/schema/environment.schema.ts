import { z } from 'zod';
import { parseDuration } from '../utils';

export const awsConfigSchema = z.object({
  profile: z.string().min(1),
  region: z.string().min(1),
  accountId: z.string().min(1).optional(),
});

export const gcpConfigSchema = z.object({
  project: z.string().min(1),
  account: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

export const azureConfigSchema = z.object({
  subscription: z.string().min(1),
  tenant: z.string().min(1).optional(),
});

export const dockerConfigSchema = z.object({
  context: z.string().min(1),
});

export const kubernetesConfigSchema = z.object({
  context: z.string().min(1),
  namespace: z.string().min(1).optional(),
});

export const sshConfigSchema = z.object({
  config: z.string().min(1),
});

export const SERVICE_KINDS = ['aws', 'gcp', 'azure', 'docker', 'kubernetes', 'ssh'] as const;

export const serviceKindSchema = z.enum(SERVICE_KINDS);

export const serviceConfigSchema = z
  .object({
    aws: awsConfigSchema.optional(),
    gcp: gcpConfigSchema.optional(),
    azure: azureConfigSchema.optional(),
    docker: dockerConfigSchema.optional(),
    kubernetes: kubernetesConfigSchema.optional(),
    ssh: sshConfigSchema.optional(),
  })
  .strict()
  .refine(
    (config) => Object.values(config).filter((variant) => variant !== undefined).length <= 1,
    { message: 'A service entry may populate at most one configuration variant' },
  );

/** Milliseconds as a number, or a duration string (`500ms`, `30s`, `1m30s`). */
export const durationSchema = z.union([
  z.number().int().nonnegative(),
  z.string().transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration "${value}" (expected e.g. 500ms, 30s, 1m30s)`,
      });
      return z.NEVER;
    }
    return ms;
  }),
]);

export const hookErrorPolicySchema = z.enum(['continue', 'fail', 'rollback']);

export type AwsConfig = z.infer<typeof awsConfigSchema>;
export type GcpConfig = z.infer<typeof gcpConfigSchema>;
export type AzureConfig = z.infer<typeof azureConfigSchema>;
export type DockerConfig = z.infer<typeof dockerConfigSchema>;
export type KubernetesConfig = z.infer<typeof kubernetesConfigSchema>;
export type SshConfig = z.infer<typeof sshConfigSchema>;
export type HookErrorPolicy = z.infer<typeof hookErrorPolicySchema>;

export interface ServiceConfigMap {
  aws: AwsConfig;
  gcp: GcpConfig;
  azure: AzureConfig;
  docker: DockerConfig;
  kubernetes: KubernetesConfig;
  ssh: SshConfig;
}

export type ServiceKind = keyof ServiceConfigMap;

/** One entry of `Environment.services`: at most one variant is populated. */
export type ServiceConfig = { [K in ServiceKind]?: ServiceConfigMap[K] };

// Declared explicitly so the transform below and hand-built environments share one shape
export interface Hook {
  command: string;
  timeoutMs?: number;
  /** `continue` makes a failure non-fatal; any other policy aborts the hook phase. */
  onError?: HookErrorPolicy;
}

export const hookSchema = z
  .object({
    command: z.string(),
    timeout: durationSchema.optional(),
    onError: hookErrorPolicySchema.optional(),
  })
  .strict()
  .transform(({ command, timeout, onError }): Hook => {
    const hook: Hook = { command };
    if (timeout !== undefined) {
      hook.timeoutMs = timeout;
    }
    if (onError !== undefined) {
      hook.onError = onError;
    }
    return hook;
  });

export interface Environment {
  name: string;
  description: string;
  services: Record<string, ServiceConfig>;
  /** Ordering constraints written as `"from -> to"`. */
  dependencies: string[];
  preHooks: Hook[];
  postHooks: Hook[];
}

export const environmentSchema = z.object({
  name: z.string().min(1, 'environment name is required'),
  description: z.string().default(''),
  services: z.record(z.string().min(1), serviceConfigSchema).default({}),
  dependencies: z.array(z.string()).default([]),
  preHooks: z.array(hookSchema).default([]),
  postHooks: z.array(hookSchema).default([]),
});

export type EnvironmentInput = z.input<typeof environmentSchema>;

type ServiceConfigLookup = {
  [K in ServiceKind]: (config: ServiceConfig) => ServiceConfigMap[K] | undefined;
};

const SERVICE_CONFIG_LOOKUP: ServiceConfigLookup = {
  aws: (config) => config.aws,
  gcp: (config) => config.gcp,
  azure: (config) => config.azure,
  docker: (config) => config.docker,
  kubernetes: (config) => config.kubernetes,
  ssh: (config) => config.ssh,
};

/**
 * Pick the configuration variant a capability of `kind` consumes.
 * Returns undefined when the entry does not populate that variant.
 */
export function selectServiceConfig<K extends ServiceKind>(
  kind: K,
  config: ServiceConfig,
): ServiceConfigMap[K] | undefined {
  return SERVICE_CONFIG_LOOKUP[kind](config);
}

export function isServiceKind(value: string): value is ServiceKind {
  return serviceKindSchema.safeParse(value).success;
}
