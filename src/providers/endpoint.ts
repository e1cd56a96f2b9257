/**
 * Endpoint URI parsing for providers that take "scheme://path" endpoints.
 * Meant to be called from a provider's parseEndpoint() hook.
 */

import { RegistrationError, RegistrationErrorCode } from '../core/errors';

/** Maximum length of a scheme */
const MAX_SCHEME_LENGTH = 64;
/** Maximum length of an endpoint path */
const MAX_PATH_LENGTH = 1024;
/** Valid scheme: lowercase alphanumeric, hyphens, underscores, starting with a letter */
const SCHEME_PATTERN = /^[a-z][a-z0-9_-]*$/;

export interface EndpointURI {
  scheme: string | null;
  path: string;
}

/**
 * Parse an endpoint like "env://APP_" into { scheme: "env", path: "APP_" }.
 * Without a scheme, returns { scheme: null, path: original }.
 *
 * Schemes are lowercased and paths percent-decoded; ".." segments and
 * over-long paths are rejected.
 *
 * @throws RegistrationError with UNRESOLVABLE_ENDPOINT on validation failure
 */
export function parseEndpointURI(endpoint: string): EndpointURI {
  if (!endpoint.trim()) {
    throw unresolvable('Endpoint must be a non-empty string');
  }

  const match = endpoint.match(/^([a-zA-Z][a-zA-Z0-9_-]*):\/\/(.*)$/);
  if (!match) {
    validateEndpointPath(endpoint);
    return { scheme: null, path: endpoint };
  }

  const scheme = match[1].toLowerCase();
  const rawPath = match[2];

  if (scheme.length > MAX_SCHEME_LENGTH) {
    throw unresolvable(`Endpoint scheme exceeds maximum length of ${MAX_SCHEME_LENGTH} characters`);
  }
  if (!SCHEME_PATTERN.test(scheme)) {
    throw unresolvable(`Invalid endpoint scheme "${scheme}"`);
  }

  let path: string;
  try {
    path = decodeURIComponent(rawPath);
  } catch {
    throw unresolvable('Invalid percent-encoding in endpoint path');
  }

  validateEndpointPath(path);
  return { scheme, path };
}

function validateEndpointPath(path: string): void {
  if (path.length === 0) {
    throw unresolvable('Endpoint path must not be empty');
  }
  if (path.length > MAX_PATH_LENGTH) {
    throw unresolvable(`Endpoint path exceeds maximum length of ${MAX_PATH_LENGTH} characters`);
  }
  if (path.split(/[/\\]/).includes('..')) {
    throw unresolvable('Endpoint path must not contain ".." segments');
  }
}

function unresolvable(message: string): RegistrationError {
  return new RegistrationError(RegistrationErrorCode.UNRESOLVABLE_ENDPOINT, message);
}
