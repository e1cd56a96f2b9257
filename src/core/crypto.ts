/**
 * Endpoint fingerprinting
 * Uses Node.js crypto with SHA-256
 */

import crypto from 'crypto';

/**
 * Fingerprint an endpoint string.
 * Returns the SHA-256 digest of its UTF-8 bytes as 64 lowercase hex chars.
 */
export function fingerprintEndpoint(endpoint: string): string {
  return crypto.createHash('sha256').update(endpoint, 'utf8').digest('hex');
}

