export {
  SERVICE_KINDS,
  awsConfigSchema,
  azureConfigSchema,
  dockerConfigSchema,
  durationSchema,
  environmentSchema,
  gcpConfigSchema,
  hookErrorPolicySchema,
  hookSchema,
  kubernetesConfigSchema,
  serviceConfigSchema,
  serviceKindSchema,
  sshConfigSchema,
} from './schema/environment.schema';
