/**
 * YAML/JSON binding for provider settings
 *
 * Expected shape under the chosen section:
 *   tracing: true
 *   instances:
 *     primary:
 *       endpoint: https://vault.local/a
 *       identifier: main
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { RegistrationError, RegistrationErrorCode, describeError } from '../core/errors';
import { type Result, ok, fail } from '../core/result';
import { createProviderSettings } from '../providers/settings';
import type { InstanceSettings, ProviderSettings } from '../providers/types';

const InstanceSettingsSchema = Type.Object(
  {
    endpoint: Type.Optional(Type.String()),
    identifier: Type.Optional(Type.String()),
  },
  { additionalProperties: true }
);

const ProviderSettingsSchema = Type.Object(
  {
    tracing: Type.Optional(Type.Boolean()),
    instances: Type.Optional(
      Type.Union([
        Type.Record(Type.String(), Type.Union([InstanceSettingsSchema, Type.Null()])),
        Type.Null(),
      ])
    ),
  },
  { additionalProperties: true }
);

export type RawInstanceSettings = Static<typeof InstanceSettingsSchema> & Record<string, unknown>;

/**
 * Turns one raw instance entry into the provider's settings object.
 */
export type InstanceFactory<T extends InstanceSettings> = (key: string, raw: RawInstanceSettings) => T;

/**
 * Bind an already-parsed configuration value into ProviderSettings.
 * A null/undefined value yields null (nothing to register).
 */
export function bindProviderSettings<T extends InstanceSettings>(
  raw: unknown,
  createInstance: InstanceFactory<T>
): Result<ProviderSettings<T> | null> {
  if (raw === null || raw === undefined) {
    return ok(null);
  }

  if (!Value.Check(ProviderSettingsSchema, raw)) {
    const problems = [...Value.Errors(ProviderSettingsSchema, raw)]
      .map(e => `${e.path || '/'}: ${e.message}`);
    return fail(new RegistrationError(
      RegistrationErrorCode.INVALID_CONFIGURATION,
      `Invalid provider settings: ${problems.join('; ')}`
    ));
  }

  // Parsed objects list integer-like keys first, so their declared order is
  // already gone by the time they get here.
  const entries = Object.entries(raw.instances ?? {});
  const reordered = entries.map(([key]) => key).filter(isArrayIndex);
  if (reordered.length > 0) {
    return fail(new RegistrationError(
      RegistrationErrorCode.INVALID_CONFIGURATION,
      `Invalid provider settings: instance keys must not be integers (${reordered.join(', ')})`
    ));
  }

  const instances = new Map<string, T | null>();
  for (const [key, entry] of entries) {
    instances.set(key, entry === null ? null : createInstance(key, { ...entry }));
  }

  return ok(createProviderSettings<T>(instances, { tracing: raw.tracing ?? true }));
}

/**
 * Load provider settings from a YAML or JSON file.
 *
 * @param section - Dotted path to the provider's section (e.g. "secrets.vault").
 *                  A missing section yields null.
 */
export function loadProviderSettings<T extends InstanceSettings>(
  filePath: string,
  section: string,
  createInstance: InstanceFactory<T>
): Result<ProviderSettings<T> | null> {
  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    return fail(new RegistrationError(
      RegistrationErrorCode.INVALID_CONFIGURATION,
      `Failed to read provider settings from ${filePath}: ${describeError(err)}`,
      { cause: err }
    ));
  }

  return bindProviderSettings(selectSection(document, section), createInstance);
}

function selectSection(document: unknown, section: string): unknown {
  let current: unknown = document;
  for (const segment of section.split('.').filter(Boolean)) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function isArrayIndex(key: string): boolean {
  return /^(0|[1-9]\d*)$/.test(key) && Number(key) < 2 ** 32 - 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
