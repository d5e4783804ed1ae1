export * from './schema';
export {
  isServiceKind,
  selectServiceConfig,
} from './schema/environment.schema';
export type {
  AwsConfig,
  AzureConfig,
  DockerConfig,
  Environment,
  EnvironmentInput,
  GcpConfig,
  Hook,
  HookErrorPolicy,
  KubernetesConfig,
  ServiceConfig,
  ServiceConfigMap,
  ServiceKind,
  SshConfig,
} from './schema/environment.schema';
export type {
  Capability,
  CapabilityContext,
  ProgressCallback,
  ServiceGroup,
  SwitchErrorRecord,
  SwitchOptions,
  SwitchProgress,
  SwitchResult,
} from './types';
export { describeError, parseDuration } from './utils';
