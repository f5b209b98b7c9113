/**
 * Log Sanitization
 *
 * Masks credentials before anything reaches the log file. The gate sees
 * every caller's API key in the authorization header, so header maps and
 * structured log arguments both pass through here.
 */

/**
 * Patterns to identify sensitive keys in objects
 */
const SENSITIVE_KEY_PATTERNS = [
  /api[_-]?key/i,
  /auth[_-]?token/i,
  /access[_-]?token/i,
  /bearer/i,
  /password/i,
  /secret/i,
  /cookie/i,
  /authorization/i
];

/**
 * Patterns to identify sensitive values even under an innocent key
 */
const SENSITIVE_VALUE_PATTERNS = [
  /^Bearer\s+\S+$/,
  /^sk-[a-zA-Z0-9]{20,}$/
];

export const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some(pattern => pattern.test(key));
}

function isSensitiveValue(value: string): boolean {
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive string, showing only the first few characters
 */
export function maskString(value: string, showChars = 4): string {
  if (value.length <= showChars * 2) {
    return REDACTED;
  }
  return `${value.slice(0, showChars)}... ${REDACTED}`;
}

/**
 * Sanitize a value for logging
 */
export function sanitizeValue(value: unknown, key?: string): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (key && isSensitiveKey(key)) {
    if (typeof value === 'string') {
      return maskString(value);
    }
    return REDACTED;
  }

  if (typeof value === 'string') {
    return isSensitiveValue(value) ? maskString(value) : value;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue(item));
  }

  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'object') {
    return sanitizeObject(value);
  }

  return value;
}

/**
 * Sanitize an object for logging
 */
export function sanitizeObject(obj: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    sanitized[key] = sanitizeValue(value, key);
  }

  return sanitized;
}

/**
 * Sanitize variadic logger arguments
 */
export function sanitizeLogArgs(...args: unknown[]): unknown[] {
  return args.map(arg => sanitizeValue(arg));
}
