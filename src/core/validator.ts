/**
 * Instance validation
 *
 * Checks run in a fixed order and the first failure stops the rest:
 *   1. settings present
 *   2. endpoint non-blank
 *   3. parseEndpoint() hook
 *   4. endpoint resolves to a fingerprint
 *   5. fingerprint unique within the provider namespace
 *   6. provider-specific validation
 */

import { RegistrationError, RegistrationErrorCode, attribute, describeError } from './errors';
import { type RegistrationLedger, providerNamespace } from './ledger';
import { type Result, ok, fail } from './result';
import type { InstanceSettings } from '../providers/types';

export interface ValidateInstanceOptions<TInstance extends InstanceSettings> {
  instanceKey: string;
  settings: TInstance | null | undefined;
  providerType: string;
  providerName: string;
  ledger: RegistrationLedger;
  validateSettings?: (settings: TInstance) => Result<void> | void;
}

/**
 * Validate one instance. On success the result carries the (parsed) settings.
 */
export function validateInstance<TInstance extends InstanceSettings>(
  options: ValidateInstanceOptions<TInstance>
): Result<TInstance> {
  const { instanceKey, settings, providerType, providerName, ledger } = options;
  const identity = { instanceKey, providerType, providerName };

  if (settings === null || settings === undefined) {
    return fail(new RegistrationError(
      RegistrationErrorCode.MISSING_SETTINGS,
      `Missing required settings for the service '${instanceKey}'`,
      identity
    ));
  }

  if (isBlank(settings.endpoint)) {
    return fail(new RegistrationError(
      RegistrationErrorCode.MISSING_ENDPOINT,
      `The 'Endpoint' is missing for service instance '${instanceKey}'`,
      identity
    ));
  }

  try {
    settings.parseEndpoint?.();
  } catch (err) {
    return fail(new RegistrationError(
      RegistrationErrorCode.UNRESOLVABLE_ENDPOINT,
      `The 'Endpoint' for service instance '${instanceKey}' could not be parsed: ${describeError(err)}`,
      { ...identity, cause: err }
    ));
  }

  let fingerprint = '';
  if (!isBlank(settings.endpoint)) {
    try {
      fingerprint = ledger.fingerprint(settings.endpoint);
    } catch (err) {
      return fail(new RegistrationError(
        RegistrationErrorCode.UNRESOLVABLE_ENDPOINT,
        `Service instance '${instanceKey}' could not be configured. Unable to resolve an 'Endpoint': ${describeError(err)}`,
        { ...identity, cause: err }
      ));
    }
  }
  if (isBlank(fingerprint)) {
    return fail(new RegistrationError(
      RegistrationErrorCode.UNRESOLVABLE_ENDPOINT,
      `Service instance '${instanceKey}' could not be configured. Unable to resolve an 'Endpoint'`,
      identity
    ));
  }

  const claimed = ledger.claimEndpoint(providerNamespace(providerType, providerName), fingerprint, instanceKey);
  if (!claimed.ok) {
    return fail(attribute(claimed.error, identity));
  }

  return runProviderValidation(options.validateSettings, settings, identity);
}

function runProviderValidation<TInstance extends InstanceSettings>(
  validateSettings: ((settings: TInstance) => Result<void> | void) | undefined,
  settings: TInstance,
  identity: { instanceKey: string; providerType: string; providerName: string }
): Result<TInstance> {
  if (!validateSettings) {
    return ok(settings);
  }

  let outcome: Result<void> | void;
  try {
    outcome = validateSettings(settings);
  } catch (err) {
    if (err instanceof RegistrationError) {
      return fail(attribute(err, identity));
    }
    return fail(new RegistrationError(
      RegistrationErrorCode.PROVIDER_VALIDATION_FAILED,
      describeError(err),
      { ...identity, cause: err }
    ));
  }

  if (outcome && !outcome.ok) {
    return fail(attribute(outcome.error, identity));
  }
  return ok(settings);
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}
