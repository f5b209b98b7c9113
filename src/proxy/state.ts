import { ProxyHTTPClient } from './http-client.js';
import { DEFAULT_MAX_BODY_BYTES } from './forwarder.js';
import type { ProxyState } from './types.js';

export interface ProxyStateOptions {
  keys: Iterable<string>;
  upstreamUrl: string;
  maxBodyBytes?: number;
  httpClient?: ProxyHTTPClient;
}

/**
 * Strip trailing slashes so `<base>/v1/...` never doubles up
 */
export function normalizeUpstreamUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Build the process-wide state once at startup. The result is frozen and
 * its key set is a private copy; nothing in it changes afterwards.
 */
export function createProxyState(options: ProxyStateOptions): ProxyState {
  const keys: ReadonlySet<string> = new Set(options.keys);

  return Object.freeze({
    keys,
    upstreamUrl: normalizeUpstreamUrl(options.upstreamUrl),
    maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    httpClient: options.httpClient ?? new ProxyHTTPClient()
  });
}
