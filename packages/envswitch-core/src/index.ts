export {
  DEFAULT_HOOK_TIMEOUT_MS,
  loadSwitcherConfig,
  type SwitcherConfig,
} from './config/config';
export {
  ENVIRONMENT_FILE_EXTENSIONS,
  environmentToYaml,
  findEnvironmentFile,
  getServiceNames,
  hasService,
  loadEnvironment,
  loadEnvironmentFromFile,
  loadNamedEnvironment,
  parseEnvironment,
  saveEnvironment,
  validateEnvironment,
} from './environment/environment';
export {
  getExecutionOrder,
  getParallelGroups,
  parseDependency,
  resolveDependencies,
  validateDependencies,
  type DependencyEdge,
} from './core/operations/dependency-resolver';
export { validateHookCommand, type HookCheck } from './core/operations/hooks/hook-gate';
export { executeHook, executeHooks, HookError, type HookPhase, type HookRunOptions } from './core/operations/hooks/hooks';
export {
  EnvironmentSwitcher,
  type EnvironmentSwitcherOptions,
} from './core/operations/switch/switch';
export {
  CapabilityRegistry,
  type CapabilityHandle,
  type CapturedState,
  type PreparedSwitch,
} from './core/registry/capability-registry';
export { registerDefaultCapabilities } from './core/registry/default-capabilities';
export { rollbackServices, type RollbackFailure } from './core/rollback/rollback';
export {
  DependencyResolutionError,
  EnvironmentConfigError,
  EnvironmentSwitchError,
  ERROR_HINTS,
  RegistryLockedError,
  type DependencyErrorCode,
  type SwitchErrorCode,
} from './errors';
