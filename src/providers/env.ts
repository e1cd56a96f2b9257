/**
 * Environment Variable Secrets Provider
 *
 * The simplest provider: each instance exposes the environment variables
 * under one prefix as a configuration source.
 *
 * Usage in config:
 *   secrets:
 *     env:
 *       instances:
 *         app:
 *           endpoint: env://APP_
 *
 * The "app" source then reads process.env.APP_* with the prefix stripped.
 */

import { RegistrationError, RegistrationErrorCode, providerValidationFailed } from '../core/errors';
import { type Result, ok, fail } from '../core/result';
import { parseEndpointURI } from './endpoint';
import { SecretsProviderInstanceSettings } from './settings';
import { type ActivationContext, type SecretsProviderCapability, SECRETS_PROVIDER_TYPE } from './types';

/** Upper-case env var fragment, e.g. "APP_" */
const ENV_PREFIX_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export class EnvInstanceSettings extends SecretsProviderInstanceSettings {
  /** Filled in by parseEndpoint() */
  prefix = '';

  /**
   * Accepts "env://PREFIX_" or a bare "PREFIX_".
   * Canonicalizes the endpoint to "env://PREFIX_".
   */
  parseEndpoint(): void {
    const { scheme, path } = parseEndpointURI(this.endpoint.trim());
    if (scheme !== null && scheme !== 'env') {
      throw new RegistrationError(
        RegistrationErrorCode.UNRESOLVABLE_ENDPOINT,
        `Unsupported endpoint scheme "${scheme}" (expected env://)`
      );
    }
    this.prefix = path;
    this.endpoint = `env://${path}`;
  }
}

export class EnvSecretsProvider implements SecretsProviderCapability<EnvInstanceSettings> {
  readonly providerType = SECRETS_PROVIDER_TYPE;
  readonly providerName = 'Env';
  readonly activitySourceNames = ['secrets.env'];

  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  validateSettings(settings: EnvInstanceSettings): Result<void> {
    if (!ENV_PREFIX_PATTERN.test(settings.prefix)) {
      return fail(providerValidationFailed(
        'Env prefix must be upper-case letters, digits and underscores, starting with a letter',
        { providerType: this.providerType, providerName: this.providerName }
      ));
    }
    return ok();
  }

  addInstance(settings: EnvInstanceSettings, context: ActivationContext): void {
    const prefix = settings.prefix;
    context.configuration.add({
      name: `env:${settings.identifier ?? context.instanceKey}`,
      load: async () => this.read(prefix),
    });
    context.services.register(`${this.providerType}.${this.providerName}::${context.instanceKey}`, settings);
  }

  private read(prefix: string): Record<string, string> {
    const values: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.env)) {
      if (value !== undefined && name.startsWith(prefix)) {
        values[name.slice(prefix.length)] = value;
      }
    }
    return values;
  }
}
