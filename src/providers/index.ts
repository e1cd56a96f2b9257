/**
 * Secrets provider contract and built-in providers
 */

export type {
  InstanceSettings,
  ProviderSettings,
  SecretsProviderCapability,
  ActivationContext,
  ServiceTarget,
  ConfigurationTarget,
  ConfigurationSource,
  TracingTarget,
} from './types';

export { SECRETS_PROVIDER_TYPE } from './types';
export { SecretsProviderInstanceSettings, createProviderSettings, countInstances } from './settings';
export { parseEndpointURI } from './endpoint';
export type { EndpointURI } from './endpoint';
export { EnvSecretsProvider, EnvInstanceSettings } from './env';
