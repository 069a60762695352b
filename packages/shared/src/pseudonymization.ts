/**
 * @parley-module: Pseudonymization
 * @parley-risk: moderate
 * @parley-scope: utility
 *
 * @description: Utilities for namespacing and hashing Discord identifiers with HMAC-SHA256.
 * Usage statistics are keyed by these digests so raw user IDs never reach the
 * stats table. Always store the full 64-hex digest, and expose only short
 * prefixes (10-12 chars) in logs.
 */

import crypto from 'node:crypto';

const HEX_DIGEST_LENGTH = 64;
const DEFAULT_SHORT_LENGTH = 12;
const HEX_64_REGEX = /^[a-f0-9]{64}$/i;

/**
 * Hash an identifier with HMAC-SHA256, namespacing by ID type so guild "123"
 * and user "123" hash differently.
 */
export function hmacId(secret: string, id: string, namespace: string): string {
  if (!secret || secret.trim().length === 0) {
    throw new Error('Pseudonymization secret must be provided.');
  }
  const input = `${namespace}:${String(id)}`;
  return crypto.createHmac('sha256', secret).update(input).digest('hex');
}

/**
 * Shortened hash for operator-facing logs; storage keeps the full digest.
 */
export function shortHash(hash: string, length: number = DEFAULT_SHORT_LENGTH): string {
  if (!hash) return '';
  return hash.slice(0, Math.max(1, Math.min(length, HEX_DIGEST_LENGTH)));
}

/**
 * Idempotently pseudonymize a user identifier. Values that already look like
 * a 64-hex digest are returned as-is.
 */
export function pseudonymizeUserId(userId: string | null | undefined, secret: string): string | null {
  if (!userId) {
    return null;
  }
  const trimmed = userId.trim();
  if (HEX_64_REGEX.test(trimmed)) {
    return trimmed;
  }
  return hmacId(secret, trimmed, 'user');
}
