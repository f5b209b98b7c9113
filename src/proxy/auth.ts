/**
 * Bearer key gate
 *
 * The authorization header must read `Bearer <key>` (exact, case-sensitive
 * prefix) and `<key>` must be one of the configured keys.
 */

import { timingSafeEqual } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import type { AuthResult } from './types.js';

export const BEARER_PREFIX = 'Bearer ';

/**
 * Read the first authorization header value. Node lower-cases header
 * names, so the lookup is case-insensitive.
 */
export function getAuthorizationHeader(headers: IncomingHttpHeaders): string | undefined {
  const value: string | string[] | undefined = headers.authorization;
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Pull the candidate key out of an authorization value, or null when the
 * value is not a bearer credential.
 */
export function extractBearerKey(authorization: string): string | null {
  if (!authorization.startsWith(BEARER_PREFIX)) {
    return null;
  }
  return authorization.slice(BEARER_PREFIX.length);
}

/**
 * Exact string equality in time independent of where the strings differ
 */
function safeEqual(candidate: Buffer, key: string): boolean {
  const expected = Buffer.from(key, 'utf8');
  if (expected.length !== candidate.length) {
    return false;
  }
  return timingSafeEqual(candidate, expected);
}

/**
 * Membership test against every key, without stopping at the first match
 */
export function isValidKey(candidate: string, keys: ReadonlySet<string>): boolean {
  const candidateBytes = Buffer.from(candidate, 'utf8');
  let found = false;
  for (const key of keys) {
    if (safeEqual(candidateBytes, key)) {
      found = true;
    }
  }
  return found;
}

export function authorize(headers: IncomingHttpHeaders, keys: ReadonlySet<string>): AuthResult {
  const authorization = getAuthorizationHeader(headers);
  if (authorization === undefined) {
    return { authorized: false, reason: 'missing' };
  }

  const candidate = extractBearerKey(authorization);
  if (candidate === null) {
    return { authorized: false, reason: 'malformed' };
  }

  if (keys.size === 0 || !isValidKey(candidate, keys)) {
    return { authorized: false, reason: 'invalid' };
  }

  return { authorized: true, key: candidate };
}
