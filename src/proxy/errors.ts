/**
 * Gate pipeline errors. Each class maps to one client-visible outcome
 * and carries the status the gate answers with.
 */

import { getErrorCode } from '../utils/errors.js';

export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProxyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      ...this.details
    };
  }
}

/**
 * Missing, malformed or unknown bearer key (401)
 */
export class AuthenticationError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 401, 'AUTH_FAILED', details);
    this.name = 'AuthenticationError';
  }
}

/**
 * Inbound body exceeded the buffering limit (400)
 */
export class BodyTooLargeError extends ProxyError {
  constructor(limit: number, details?: Record<string, unknown>) {
    super(`Request body exceeds ${limit} bytes`, 400, 'BODY_TOO_LARGE', { limit, ...details });
    this.name = 'BodyTooLargeError';
  }
}

/**
 * Inbound body stream failed before it was fully read (400)
 */
export class BodyReadError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BODY_READ_FAILED', details);
    this.name = 'BodyReadError';
  }
}

/**
 * Upstream unreachable or the connection broke mid-exchange (502)
 */
export class NetworkError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

/**
 * The client went away before the exchange finished. Nothing is sent back.
 */
export class RequestAbortedError extends Error {
  constructor(message = 'Client disconnected') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error &&
    (error.name === 'AbortError' || getErrorCode(error) === 'ABORT_ERR');
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ECONNRESET',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_STREAM_PREMATURE_CLOSE'
]);

/**
 * Whether a raw Node error is a transport failure talking to the upstream
 */
export function isNetworkFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = getErrorCode(error);
  return (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    error.message.includes('socket hang up');
}

/**
 * Convert unknown errors to ProxyError
 */
export function normalizeError(error: unknown, context?: Record<string, unknown>): ProxyError {
  if (error instanceof ProxyError) {
    return error;
  }

  if (error instanceof Error) {
    if (isNetworkFailure(error)) {
      return new NetworkError(`Cannot connect to upstream: ${error.message}`, {
        originalError: error.message,
        errorCode: getErrorCode(error),
        ...context
      });
    }

    return new ProxyError(error.message, 500, 'INTERNAL_ERROR', {
      originalError: error.message,
      ...context
    });
  }

  return new ProxyError(String(error), 500, 'UNKNOWN_ERROR', {
    originalError: String(error),
    ...context
  });
}
