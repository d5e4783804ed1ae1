import {
  AwsCapability,
  AzureCapability,
  DockerCapability,
  GcpCapability,
  KubernetesCapability,
  SshCapability,
} from '@envswitch/adapters/capabilities';
import { runCommand, type CommandRunner } from '@envswitch/adapters/shell';
import type { CapabilityRegistry } from './capability-registry';

/**
 * Registers the six built-in capabilities under their kind names
 * (`aws`, `gcp`, `azure`, `docker`, `kubernetes`, `ssh`), all running
 * their CLIs through `run`.
 */
export function registerDefaultCapabilities(
  registry: CapabilityRegistry,
  run: CommandRunner = runCommand,
): CapabilityRegistry {
  return registry
    .register(new AwsCapability(run))
    .register(new GcpCapability(run))
    .register(new AzureCapability(run))
    .register(new DockerCapability(run))
    .register(new KubernetesCapability(run))
    .register(new SshCapability(run));
}
