/**
 * Registration ledger
 *
 * Records which registration keys and which endpoint fingerprints have been
 * claimed. Claims are permanent for the lifetime of the ledger: there is no
 * removal and no reset. One ledger is created at bootstrap and shared by
 * every registrar.
 *
 * Each claim is a single synchronous check-and-insert on a Map, so no other
 * registration can interleave between the check and the insert.
 */

import { fingerprintEndpoint } from './crypto';
import { RegistrationError, RegistrationErrorCode } from './errors';
import { type Result, ok, fail } from './result';

export interface LedgerOptions {
  /** Fingerprint function (default: SHA-256 hex) */
  fingerprint?: (endpoint: string) => string;
}

/**
 * Build the registration key for one instance of a provider.
 */
export function registrationKey(providerType: string, providerName: string, instanceKey: string): string {
  return `${providerNamespace(providerType, providerName)}::${instanceKey}`;
}

/**
 * Namespace endpoint fingerprints are compared within.
 */
export function providerNamespace(providerType: string, providerName: string): string {
  return `${providerType}.${providerName}`;
}

function endpointClaimKey(namespace: string, fingerprint: string): string {
  return `${namespace}.Connections:${fingerprint}`;
}

export class RegistrationLedger {
  private registrations: Map<string, string> = new Map();
  private endpoints: Map<string, string> = new Map();
  private fingerprintFn: (endpoint: string) => string;

  constructor(options: LedgerOptions = {}) {
    this.fingerprintFn = options.fingerprint ?? fingerprintEndpoint;
  }

  /**
   * Claim a registration key. Succeeds once per key; every later claim
   * fails, whatever endpoint it carries. `instanceKey` names the instance in
   * the error.
   */
  claimRegistration(key: string, endpoint: string, instanceKey: string): Result<void> {
    if (this.registrations.has(key)) {
      return fail(new RegistrationError(
        RegistrationErrorCode.ALREADY_REGISTERED,
        `A service with the key of '${instanceKey}' has already been registered.`,
        { instanceKey }
      ));
    }
    this.registrations.set(key, endpoint);
    return ok();
  }

  /**
   * Claim an endpoint fingerprint within a provider namespace.
   */
  claimEndpoint(namespace: string, fingerprint: string, instanceKey: string): Result<void> {
    const claimKey = endpointClaimKey(namespace, fingerprint);
    const owner = this.endpoints.get(claimKey);
    if (owner !== undefined) {
      return fail(new RegistrationError(
        RegistrationErrorCode.DUPLICATE_ENDPOINT,
        `An endpoint string for service instance '${instanceKey}' has already been configured by instance '${owner}' of ${namespace}. ` +
        'Cannot register the same endpoint with multiple instances.',
        { instanceKey }
      ));
    }
    this.endpoints.set(claimKey, instanceKey);
    return ok();
  }

  fingerprint(endpoint: string): string {
    return this.fingerprintFn(endpoint);
  }

  hasRegistration(key: string): boolean {
    return this.registrations.has(key);
  }

  hasEndpoint(namespace: string, fingerprint: string): boolean {
    return this.endpoints.has(endpointClaimKey(namespace, fingerprint));
  }

  /**
   * Instance key that owns an endpoint, if claimed
   */
  endpointOwner(namespace: string, fingerprint: string): string | undefined {
    return this.endpoints.get(endpointClaimKey(namespace, fingerprint));
  }

  /**
   * Claimed registration keys, in claim order. Endpoints are not exposed.
   */
  registrationKeys(): string[] {
    return Array.from(this.registrations.keys());
  }

  get size(): { registrations: number; endpoints: number } {
    return { registrations: this.registrations.size, endpoints: this.endpoints.size };
  }
}
