/**
 * Settings model helpers
 */

import type { InstanceSettings, ProviderSettings } from './types';

/**
 * Base class for instance settings.
 * Derived classes add provider fields and may override parseEndpoint().
 */
export class SecretsProviderInstanceSettings implements InstanceSettings {
  identifier?: string;
  endpoint: string;

  constructor(init: { endpoint?: string; identifier?: string } = {}) {
    this.endpoint = init.endpoint ?? '';
    this.identifier = init.identifier;
  }

  /**
   * No-op unless overridden.
   */
  parseEndpoint(): void {}
}

type InstanceEntries<TInstance> = Iterable<readonly [string, TInstance | null | undefined]>;

/**
 * Build provider settings from an object or from [key, settings] entries.
 *
 * Objects list integer-like keys ("1", "2") first whatever order they were
 * written in. Pass entries (or a Map) when such keys must keep their order.
 */
export function createProviderSettings<TInstance extends InstanceSettings>(
  instances: Record<string, TInstance | null | undefined> | InstanceEntries<TInstance>,
  options: { tracing?: boolean } = {}
): ProviderSettings<TInstance> {
  return {
    tracing: options.tracing ?? true,
    instances: new Map(isEntries(instances) ? instances : Object.entries(instances)),
  };
}

function isEntries<TInstance>(
  value: Record<string, TInstance | null | undefined> | InstanceEntries<TInstance>
): value is InstanceEntries<TInstance> {
  return Symbol.iterator in value;
}

/**
 * Number of declared instances (0 when settings are absent).
 */
export function countInstances<TInstance extends InstanceSettings>(
  settings: ProviderSettings<TInstance> | null | undefined
): number {
  return settings ? settings.instances.size : 0;
}
