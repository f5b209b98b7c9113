/**
 * Pooled HTTP client for upstream forwarding
 *
 * One instance lives in ProxyState for the whole process. Keep-alive
 * agents reuse upstream connections across requests; the client itself
 * holds no per-request state.
 */

import https from 'https';
import http from 'http';
import { NetworkError, RequestAbortedError, isAbortError, normalizeError } from './errors.js';
import { pairRawHeaders } from './headers.js';
import type { OutboundRequest, UpstreamResponse } from './types.js';
import { logger } from '../utils/logger.js';

export interface HTTPClientOptions {
  /** Per-origin connection cap for each agent */
  maxSockets?: number;
}

export class ProxyHTTPClient {
  private httpsAgent: https.Agent;
  private httpAgent: http.Agent;

  constructor(options: HTTPClientOptions = {}) {
    const maxSockets = options.maxSockets ?? 50;

    this.httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets
    });
    this.httpAgent = new http.Agent({
      keepAlive: true,
      maxSockets
    });
  }

  /**
   * Send one request and buffer the whole upstream response.
   *
   * Rejects with NetworkError on transport failure and with
   * RequestAbortedError when `signal` fires. Upstream error statuses
   * resolve normally.
   */
  async send(request: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
    const { url } = request;
    const isHttps = url.protocol === 'https:';
    const options: https.RequestOptions = {
      method: request.method,
      headers: request.headers,
      agent: isHttps ? this.httpsAgent : this.httpAgent,
      signal
    };

    const upstream = await new Promise<http.IncomingMessage>((resolve, reject) => {
      let req: http.ClientRequest;
      try {
        req = isHttps
          ? https.request(url, options, resolve)
          : http.request(url, options, resolve);
      } catch (error) {
        // Invalid method or header value rejected by Node before any I/O
        reject(normalizeError(error, { url: url.toString() }));
        return;
      }

      req.on('error', (error: Error) => {
        reject(this.toSendError(error, url));
      });

      req.end(request.body);
    });

    try {
      const body = await this.readBody(upstream);
      return {
        statusCode: upstream.statusCode ?? 200,
        headers: pairRawHeaders(upstream.rawHeaders),
        body
      };
    } catch (error) {
      throw this.toSendError(error, url);
    }
  }

  /**
   * Read response body into buffer
   */
  async readBody(response: http.IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];

    for await (const chunk of response) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    if (!response.complete) {
      throw new NetworkError('Upstream closed the connection mid-response', {
        errorCode: 'ERR_STREAM_PREMATURE_CLOSE'
      });
    }

    return Buffer.concat(chunks);
  }

  private toSendError(error: unknown, url: URL): Error {
    if (isAbortError(error)) {
      return new RequestAbortedError();
    }
    if (error instanceof NetworkError) {
      return error;
    }

    // Anything that goes wrong on the wire after dispatch is a transport failure
    const proxyError = normalizeError(error, { hostname: url.hostname });
    if (proxyError instanceof NetworkError) {
      return proxyError;
    }
    logger.debug(`[http-client] Treating ${proxyError.code} as a transport failure`);
    return new NetworkError(`Upstream request failed: ${proxyError.message}`, {
      errorCode: proxyError.code,
      hostname: url.hostname
    });
  }

  /**
   * Close HTTP client and cleanup agents
   */
  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }
}
