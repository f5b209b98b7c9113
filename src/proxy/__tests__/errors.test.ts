import { describe, it, expect } from 'vitest';
import {
  BodyTooLargeError,
  NetworkError,
  ProxyError,
  isAbortError,
  isNetworkFailure,
  normalizeError
} from '../errors.js';

function errnoError(message: string, code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('normalizeError', () => {
  it('should pass ProxyErrors through', () => {
    const error = new BodyTooLargeError(10);
    expect(normalizeError(error)).toBe(error);
  });

  it('should map connection failures to NetworkError', () => {
    for (const code of ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN']) {
      const normalized = normalizeError(errnoError(`connect ${code}`, code));
      expect(normalized).toBeInstanceOf(NetworkError);
      expect(normalized.statusCode).toBe(502);
    }
  });

  it('should map socket hang up to NetworkError', () => {
    expect(normalizeError(new Error('socket hang up'))).toBeInstanceOf(NetworkError);
  });

  it('should map other errors to a 500 ProxyError', () => {
    const normalized = normalizeError(new Error('unexpected'), { url: '/v1/x' });
    expect(normalized).toBeInstanceOf(ProxyError);
    expect(normalized).not.toBeInstanceOf(NetworkError);
    expect(normalized.toJSON()).toEqual({
      type: 'ProxyError',
      code: 'INTERNAL_ERROR',
      message: 'unexpected',
      statusCode: 500,
      originalError: 'unexpected',
      url: '/v1/x'
    });
  });

  it('should handle non-Error values', () => {
    expect(normalizeError('weird').code).toBe('UNKNOWN_ERROR');
  });
});

describe('isNetworkFailure / isAbortError', () => {
  it('should classify errors by code', () => {
    expect(isNetworkFailure(errnoError('x', 'ECONNREFUSED'))).toBe(true);
    expect(isNetworkFailure(new Error('x'))).toBe(false);
    expect(isNetworkFailure('ECONNREFUSED')).toBe(false);
  });

  it('should recognize aborts', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(errnoError('aborted', 'ABORT_ERR'))).toBe(true);
    expect(isAbortError(new Error('other'))).toBe(false);
  });
});
