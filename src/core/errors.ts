/**
 * Registration error taxonomy
 *
 * Every failure the registrar can report carries a code, the offending
 * instance key and the provider identity. Raw endpoint values never appear
 * in messages.
 */

/**
 * Error codes for categorizing registration failures.
 */
export enum RegistrationErrorCode {
  /** A registration key was claimed twice */
  ALREADY_REGISTERED = 'ALREADY_REGISTERED',
  /** An instance entry has no settings object */
  MISSING_SETTINGS = 'MISSING_SETTINGS',
  /** The instance endpoint is empty or blank */
  MISSING_ENDPOINT = 'MISSING_ENDPOINT',
  /** Endpoint parsing failed or produced no usable fingerprint */
  UNRESOLVABLE_ENDPOINT = 'UNRESOLVABLE_ENDPOINT',
  /** Two instances of one provider point at the same endpoint */
  DUPLICATE_ENDPOINT = 'DUPLICATE_ENDPOINT',
  /** The provider's own validation rejected the settings */
  PROVIDER_VALIDATION_FAILED = 'PROVIDER_VALIDATION_FAILED',
  /** The provider's activation hook threw */
  ACTIVATION_FAILED = 'ACTIVATION_FAILED',
  /** Provider type or name cannot be used to build registration keys */
  INVALID_PROVIDER = 'INVALID_PROVIDER',
  /** Bound configuration does not have the provider settings shape */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
}

export interface RegistrationErrorOptions {
  instanceKey?: string;
  providerType?: string;
  providerName?: string;
  cause?: unknown;
}

/**
 * Typed error for registration failures.
 * Enables programmatic handling without message parsing.
 */
export class RegistrationError extends Error {
  readonly code: RegistrationErrorCode;
  readonly instanceKey?: string;
  readonly providerType?: string;
  readonly providerName?: string;

  constructor(code: RegistrationErrorCode, message: string, options: RegistrationErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RegistrationError';
    this.code = code;
    this.instanceKey = options.instanceKey;
    this.providerType = options.providerType;
    this.providerName = options.providerName;
  }
}

/**
 * Build a PROVIDER_VALIDATION_FAILED error from a provider's validateSettings hook.
 */
export function providerValidationFailed(
  message: string,
  options: RegistrationErrorOptions = {}
): RegistrationError {
  return new RegistrationError(RegistrationErrorCode.PROVIDER_VALIDATION_FAILED, message, options);
}

/**
 * Fill in identity an error was raised without (ledger claims and provider
 * hooks do not know every field). An error that already carries the full
 * identity is returned as is.
 */
export function attribute(
  error: RegistrationError,
  identity: { instanceKey?: string; providerType: string; providerName: string }
): RegistrationError {
  if (
    error.providerType !== undefined &&
    error.providerName !== undefined &&
    (error.instanceKey !== undefined || identity.instanceKey === undefined)
  ) {
    return error;
  }
  const attributed = new RegistrationError(error.code, error.message, {
    instanceKey: error.instanceKey ?? identity.instanceKey,
    providerType: error.providerType ?? identity.providerType,
    providerName: error.providerName ?? identity.providerName,
    cause: error.cause,
  });
  attributed.stack = error.stack;
  return attributed;
}

/**
 * Human-readable text for an unknown thrown value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
