export { AwsCapability } from './aws';
export type { AwsState } from './aws';
export { AzureCapability } from './azure';
export type { AzureState } from './azure';
export { DockerCapability } from './docker';
export type { DockerState } from './docker';
export { GcpCapability } from './gcp';
export type { GcpState } from './gcp';
export { KubernetesCapability } from './kubernetes';
export type { KubernetesState } from './kubernetes';
export { SshCapability } from './ssh';
export type { SshState } from './ssh';
