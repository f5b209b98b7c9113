/**
 * Response mapping
 *
 * Relays an upstream response to the client unchanged, or answers a
 * pipeline failure with its fixed plain-text body.
 */

import type { ServerResponse } from 'http';
import { filterHeaders, groupHeaders } from './headers.js';
import { ProxyError } from './errors.js';
import type { UpstreamResponse } from './types.js';
import { logger } from '../utils/logger.js';

export const FALLBACK_STATUS = 200;

/**
 * Plain-text bodies, keyed by status. The upstream cause of a 502 is
 * logged, never sent to the caller.
 */
export const ERROR_BODIES: Readonly<Record<number, string>> = {
  400: 'Failed to read body',
  401: 'Unauthorized',
  404: 'Not Found',
  502: 'Upstream request failed'
};

/**
 * Copy an upstream status, or fall back to 200 when it cannot be
 * written back out (outside 100-999).
 */
export function resolveStatusCode(statusCode: number): number {
  if (Number.isInteger(statusCode) && statusCode >= 100 && statusCode <= 999) {
    return statusCode;
  }
  return FALLBACK_STATUS;
}

/**
 * Send a short plain-text response. No-op once headers are out.
 */
export function sendPlainText(res: ServerResponse, statusCode: number, body: string): void {
  if (res.headersSent || res.writableEnded) return;

  res.writeHead(statusCode, {
    'Content-Type': 'text/plain; charset=utf-8',
    'Content-Length': Buffer.byteLength(body)
  });
  res.end(body);
}

/**
 * Last resort after a failed assembly: 500 with an empty body
 */
export function sendEmptyServerError(res: ServerResponse): void {
  if (res.headersSent || res.writableEnded) return;

  // Drop anything setHeader managed to stage before the failure
  for (const name of res.getHeaderNames()) {
    res.removeHeader(name);
  }
  res.writeHead(500, { 'Content-Length': 0 });
  res.end();
}

/**
 * Answer a pipeline failure with its status and fixed body
 */
export function mapProxyError(res: ServerResponse, error: ProxyError): void {
  sendPlainText(res, error.statusCode, ERROR_BODIES[error.statusCode] ?? '');
}

/**
 * The upstream could not be reached: 502, cause logged for operators
 */
export function mapTransportFailure(res: ServerResponse, error: Error): void {
  logger.error('error forwarding request', error);
  sendPlainText(res, 502, ERROR_BODIES[502]);
}

/**
 * Write status, text-representable headers and the body verbatim.
 * Header values that are not visible ASCII are dropped. If Node refuses
 * the assembled head, the client gets an empty 500.
 */
export function mapUpstreamResponse(res: ServerResponse, upstream: UpstreamResponse): void {
  if (res.headersSent || res.writableEnded) return;

  try {
    res.writeHead(
      resolveStatusCode(upstream.statusCode),
      groupHeaders(filterHeaders(upstream.headers))
    );
  } catch (error) {
    logger.error('failed to assemble response', error);
    sendEmptyServerError(res);
    return;
  }

  res.end(upstream.body);
}
