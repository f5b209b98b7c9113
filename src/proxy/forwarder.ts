/**
 * Request forwarding
 *
 * Turns an authorized inbound request into exactly one upstream call:
 * buffer the body (bounded), copy method and headers, republish the path
 * under the same /v1/ prefix on the upstream.
 */

import type { IncomingMessage } from 'http';
import type { Readable } from 'stream';
import { BodyReadError, BodyTooLargeError } from './errors.js';
import { EXCLUDED_REQUEST_HEADERS, filterHeaders, groupHeaders, pairRawHeaders } from './headers.js';
import type { OutboundRequest, ProxyState, UpstreamResponse } from './types.js';
import { getErrorMessage } from '../utils/errors.js';

/** Fixed routing prefix, identical on the inbound and the upstream side */
export const ROUTE_PREFIX = '/v1/';

/** 8 MiB */
export const DEFAULT_MAX_BODY_BYTES = 8 * 1024 * 1024;

export const FALLBACK_METHOD = 'GET';

const HTTP_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Buffer the whole inbound body, failing once it passes `maxBytes`.
 *
 * On overflow the rest of the stream is drained and discarded so the
 * 400 can still reach the client. A body that runs on for more than
 * another `maxBytes` after that is cut off by destroying the stream.
 */
export function readBody(req: Readable, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    const cleanup = (): void => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
    };

    const onData = (chunk: Buffer): void => {
      received += chunk.length;
      if (received > maxBytes) {
        settled = true;
        cleanup();
        chunks.length = 0;
        // A listener keeps later stream errors from going unhandled
        req.on('error', () => undefined);
        let discarded = 0;
        req.on('data', (extra: Buffer) => {
          discarded += extra.length;
          if (discarded > maxBytes) req.destroy();
        });
        reject(new BodyTooLargeError(maxBytes, { received }));
        return;
      }
      chunks.push(chunk);
    };

    const onEnd = (): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(Buffer.concat(chunks, received));
    };

    const onError = (error: Error): void => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(new BodyReadError(`Failed to read request body: ${getErrorMessage(error)}`));
    };

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
  });
}

/**
 * Copy the inbound method, or fall back to GET when it is not a valid
 * HTTP token. Availability wins over strict fidelity here.
 */
export function resolveMethod(method: string | undefined): string {
  if (method && HTTP_TOKEN.test(method)) {
    return method;
  }
  return FALLBACK_METHOD;
}

/**
 * `<upstreamUrl>/v1/<pathSuffix>`, keeping the inbound query string
 */
export function buildTargetUrl(upstreamUrl: string, pathSuffix: string, search = ''): URL {
  return new URL(`${upstreamUrl}${ROUTE_PREFIX}${pathSuffix}${search}`);
}

export function buildOutboundRequest(
  state: ProxyState,
  req: Pick<IncomingMessage, 'method' | 'rawHeaders'>,
  pathSuffix: string,
  search: string,
  body: Buffer
): OutboundRequest {
  const headers = filterHeaders(pairRawHeaders(req.rawHeaders), EXCLUDED_REQUEST_HEADERS);

  return {
    method: resolveMethod(req.method),
    url: buildTargetUrl(state.upstreamUrl, pathSuffix, search),
    headers: groupHeaders(headers),
    body
  };
}

/**
 * Issue the single upstream call through the shared pooled client
 */
export function forwardRequest(
  state: ProxyState,
  outbound: OutboundRequest,
  signal?: AbortSignal
): Promise<UpstreamResponse> {
  return state.httpClient.send(outbound, signal);
}
