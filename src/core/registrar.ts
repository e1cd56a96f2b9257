/**
 * Secrets Provider Registrar
 *
 * Admits a provider's configured instances into the host, one at a time:
 * claim the registration key, validate, then call the provider's activation
 * hook. The first failure stops registration. Instances admitted before it
 * stay registered and their ledger claims stay in place.
 */

import { RegistrationError, RegistrationErrorCode, attribute, describeError } from './errors';
import { type RegistrationLedger, providerNamespace, registrationKey } from './ledger';
import { type Logger, consoleLogger } from './logger';
import { type Result, ok, fail } from './result';
import { validateInstance } from './validator';
import { countInstances } from '../providers/settings';
import type {
  ConfigurationTarget,
  InstanceSettings,
  ProviderSettings,
  SecretsProviderCapability,
  ServiceTarget,
  TracingTarget,
} from '../providers/types';

export type RegistrationState =
  | 'idle'
  | 'iterating'
  | 'claiming'
  | 'validating'
  | 'activating'
  | 'tracing-configured'
  | 'done'
  | 'failed';

export interface RegistrarOptions {
  /** Ledger shared by every registrar created at bootstrap */
  ledger: RegistrationLedger;
  /** Telemetry collaborator; tracing is skipped when absent */
  tracing?: TracingTarget;
  logger?: Logger;
}

export interface RegistrationSummary {
  providerType: string;
  providerName: string;
  /** True when there was nothing to register */
  skipped: boolean;
  /** Instance keys admitted, in registration order */
  registered: string[];
  /** True when activity sources were handed to the tracing collaborator */
  tracingEnabled: boolean;
}

export class SecretsProviderRegistrar<TInstance extends InstanceSettings> {
  private readonly provider: SecretsProviderCapability<TInstance>;
  private readonly ledger: RegistrationLedger;
  private readonly tracing?: TracingTarget;
  private readonly logger: Logger;
  private currentState: RegistrationState = 'idle';

  constructor(provider: SecretsProviderCapability<TInstance>, options: RegistrarOptions) {
    assertProviderIdentity(provider);
    this.provider = provider;
    this.ledger = options.ledger;
    this.tracing = options.tracing;
    this.logger = options.logger ?? consoleLogger;
  }

  get state(): RegistrationState {
    return this.currentState;
  }

  /** "<providerType>.<providerName>" */
  get namespace(): string {
    return providerNamespace(this.provider.providerType, this.provider.providerName);
  }

  /**
   * Register every configured instance of the provider, then enable tracing
   * for its activity sources if requested.
   */
  async register(
    providerSettings: ProviderSettings<TInstance> | null | undefined,
    services: ServiceTarget,
    configuration: ConfigurationTarget
  ): Promise<Result<RegistrationSummary>> {
    this.transition('idle');

    if (!providerSettings || countInstances(providerSettings) === 0) {
      this.logger.debug(`${this.namespace}: no instances configured, nothing to register`);
      this.transition('done');
      return ok(this.summary(true, [], false));
    }

    this.transition('iterating');
    const registered: string[] = [];

    for (const [key, settings] of providerSettings.instances) {
      const admitted = await this.admit(key, settings, services, configuration);
      if (!admitted.ok) {
        return admitted;
      }
      registered.push(key);
    }

    const tracingEnabled = this.configureTracing(providerSettings.tracing);
    this.transition('done');
    this.logger.info(`${this.namespace}: registered ${registered.length} instance(s)`);
    return ok(this.summary(false, registered, tracingEnabled));
  }

  /**
   * Register a single instance outside of a full provider registration.
   * Same claim, validate, activate sequence as register().
   */
  async registerInstance(
    key: string,
    settings: TInstance | null | undefined,
    services: ServiceTarget,
    configuration: ConfigurationTarget
  ): Promise<Result<void>> {
    this.transition('idle');
    const admitted = await this.admit(key, settings, services, configuration);
    if (!admitted.ok) {
      return admitted;
    }
    this.transition('done');
    return ok();
  }

  private async admit(
    key: string,
    settings: TInstance | null | undefined,
    services: ServiceTarget,
    configuration: ConfigurationTarget
  ): Promise<Result<void>> {
    const { providerType, providerName } = this.provider;

    this.transition('claiming');
    const claimed = this.ledger.claimRegistration(
      registrationKey(providerType, providerName, key),
      settings?.endpoint ?? '',
      key
    );
    if (!claimed.ok) {
      return this.failWith(attribute(claimed.error, { instanceKey: key, providerType, providerName }));
    }

    this.transition('validating');
    const validated = validateInstance({
      instanceKey: key,
      settings,
      providerType,
      providerName,
      ledger: this.ledger,
      validateSettings: this.provider.validateSettings
        ? (s: TInstance) => this.provider.validateSettings?.(s)
        : undefined,
    });
    if (!validated.ok) {
      return this.failWith(validated.error);
    }

    this.transition('activating');
    try {
      await this.provider.addInstance(validated.value, { instanceKey: key, services, configuration });
    } catch (err) {
      return this.failWith(new RegistrationError(
        RegistrationErrorCode.ACTIVATION_FAILED,
        `Activation of service instance '${key}' failed: ${describeError(err)}`,
        { instanceKey: key, providerType, providerName, cause: err }
      ));
    }

    this.logger.info(`${this.namespace}: registered instance '${key}'`);
    return ok();
  }

  private configureTracing(requested: boolean): boolean {
    const sources = this.provider.activitySourceNames;
    if (!requested || sources.length === 0) {
      return false;
    }
    if (!this.tracing) {
      this.logger.warn(`${this.namespace}: tracing requested but no tracing collaborator is configured`);
      return false;
    }
    this.tracing.addSources(sources);
    this.transition('tracing-configured');
    this.logger.info(`${this.namespace}: tracing enabled for ${sources.join(', ')}`);
    return true;
  }

  private failWith(error: RegistrationError): Result<never> {
    this.transition('failed');
    this.logger.error(`${this.namespace}: [${error.code}] ${error.message}`);
    return fail(error);
  }

  private transition(next: RegistrationState): void {
    this.logger.debug(`${this.namespace}: ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private summary(skipped: boolean, registered: string[], tracingEnabled: boolean): RegistrationSummary {
    return {
      providerType: this.provider.providerType,
      providerName: this.provider.providerName,
      skipped,
      registered,
      tracingEnabled,
    };
  }
}

function assertProviderIdentity(provider: { providerType: string; providerName: string }): void {
  for (const [field, value] of [
    ['providerType', provider.providerType],
    ['providerName', provider.providerName],
  ] as const) {
    if (!value.trim() || value.includes('::')) {
      throw new RegistrationError(
        RegistrationErrorCode.INVALID_PROVIDER,
        `Invalid ${field} "${value}": must be non-blank and must not contain "::"`,
        { providerType: provider.providerType, providerName: provider.providerName }
      );
    }
  }
}
