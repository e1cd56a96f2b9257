/**
 * Secrets provider registration
 *
 * Usage:
 *   const ledger = new RegistrationLedger();
 *   const registrar = new SecretsProviderRegistrar(new EnvSecretsProvider(), { ledger, tracing });
 *
 *   const settings = unwrap(loadProviderSettings('app.yaml', 'secrets.env',
 *     (key, raw) => new EnvInstanceSettings(raw)));
 *   unwrap(await registrar.register(settings, services, configuration));
 */

export * from './providers';

export { SecretsProviderRegistrar } from './core/registrar';
export type { RegistrarOptions, RegistrationSummary, RegistrationState } from './core/registrar';
export { RegistrationLedger, registrationKey, providerNamespace } from './core/ledger';
export type { LedgerOptions } from './core/ledger';
export { validateInstance } from './core/validator';
export type { ValidateInstanceOptions } from './core/validator';
export { fingerprintEndpoint } from './core/crypto';
export { TracingRegistry } from './core/tracing';
export {
  RegistrationError,
  RegistrationErrorCode,
  providerValidationFailed,
  attribute,
} from './core/errors';
export type { RegistrationErrorOptions } from './core/errors';
export { ok, fail, unwrap } from './core/result';
export type { Result } from './core/result';
export { consoleLogger, silentLogger, DEBUG_ENV_VAR } from './core/logger';
export type { Logger } from './core/logger';

export { bindProviderSettings, loadProviderSettings } from './config/settings-yaml';
export type { InstanceFactory, RawInstanceSettings } from './config/settings-yaml';
