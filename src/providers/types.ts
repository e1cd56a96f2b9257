/**
 * Secrets Provider Plugin Interface
 *
 * Defines the contract a secrets provider implements to be admitted by the
 * registrar, and the settings shapes it is registered from.
 */

import type { Result } from '../core/result';

/** Provider type tag used by secrets providers */
export const SECRETS_PROVIDER_TYPE = 'Secrets';

// --- Settings --------------------------------------------

/**
 * Settings for one configured connection of a provider.
 * Providers extend this with their own fields.
 */
export interface InstanceSettings {
  /** Id associated with the instance, if the provider needs one */
  identifier?: string;
  /** uri/url/arn/connection string the instance connects to */
  endpoint: string;
  /**
   * Normalize `endpoint` in place. Runs once, after the endpoint is known to
   * be non-blank. Throw to signal an unparseable endpoint.
   */
  parseEndpoint?(): void;
}

/**
 * Provider-level settings: a tracing switch plus the named instances.
 */
export interface ProviderSettings<TInstance extends InstanceSettings = InstanceSettings> {
  /** Subscribe the provider's activity sources after registration */
  tracing: boolean;
  /**
   * Instances by key, in declared order. A null entry is reported as
   * missing settings.
   */
  instances: ReadonlyMap<string, TInstance | null | undefined>;
}

// --- Collaborators ---------------------------------------

/**
 * Service container the host hands to activation hooks.
 */
export interface ServiceTarget {
  register(token: string, value: unknown): void;
}

/**
 * A source of configuration values added by an activated instance.
 */
export interface ConfigurationSource {
  name: string;
  load(): Promise<Record<string, string>>;
}

/**
 * Configuration builder the host hands to activation hooks.
 */
export interface ConfigurationTarget {
  add(source: ConfigurationSource): void;
}

/**
 * Telemetry capability consumed by the registrar.
 */
export interface TracingTarget {
  addSources(names: readonly string[]): void;
}

export interface ActivationContext {
  /** Key of the instance being activated */
  instanceKey: string;
  services: ServiceTarget;
  configuration: ConfigurationTarget;
}

// --- Provider Capability ---------------------------------

/**
 * What a concrete provider supplies to the registrar.
 */
export interface SecretsProviderCapability<TInstance extends InstanceSettings = InstanceSettings> {
  /** Provider type tag (e.g., "Secrets") */
  readonly providerType: string;

  /** Provider name (e.g., "Vault", "Env") */
  readonly providerName: string;

  /** Activity/instrumentation sources subscribed when tracing is on */
  readonly activitySourceNames: readonly string[];

  /**
   * Provider-specific validation. Runs last, on an instance that already has
   * a parsed, unique endpoint. Return a failed Result or throw to reject.
   */
  validateSettings?(settings: TInstance): Result<void> | void;

  /**
   * Activation hook: wire one validated instance into the host.
   * Not retried.
   */
  addInstance(settings: TInstance, context: ActivationContext): void | Promise<void>;
}
