/**
 * Tagged results
 *
 * Registration operations return a Result instead of throwing so callers
 * propagate failures explicitly.
 */

import type { RegistrationError } from './errors';

export type Result<T, E = RegistrationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok(value?: unknown): Result<unknown, never> {
  return { ok: true, value };
}

export function fail<E = RegistrationError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Return the value of a successful result, or throw its error.
 * For hosts that abort startup by exception.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
