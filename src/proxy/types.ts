/**
 * Proxy Types
 *
 * Type definitions for the request pipeline.
 */

import type { OutgoingHttpHeaders } from 'http';
import type { ProxyHTTPClient } from './http-client.js';

/**
 * Process-wide, read-only state handed to every request
 */
export interface ProxyState {
  readonly keys: ReadonlySet<string>;
  /** Upstream base URL without trailing slash */
  readonly upstreamUrl: string;
  readonly maxBodyBytes: number;
  readonly httpClient: ProxyHTTPClient;
}

/**
 * Header multimap as an ordered list of name/value pairs
 */
export type HeaderPairs = ReadonlyArray<readonly [string, string]>;

/**
 * Request built from the inbound one, sent once, then discarded
 */
export interface OutboundRequest {
  method: string;
  url: URL;
  headers: OutgoingHttpHeaders;
  body: Buffer;
}

/**
 * Upstream response, fully buffered
 */
export interface UpstreamResponse {
  statusCode: number;
  headers: HeaderPairs;
  body: Buffer;
}

export type AuthFailureReason = 'missing' | 'malformed' | 'invalid';

export type AuthResult =
  | { authorized: true; key: string }
  | { authorized: false; reason: AuthFailureReason };
