/**
 * Gate Proxy Server
 *
 * Serves `/v1/<rest>` for any method and runs each request through
 * authorize → read body → forward → map. Everything else is 404.
 *
 * The handler keeps no state between requests; all it shares is the
 * frozen ProxyState (keys, upstream URL, pooled client).
 */

import { createServer, Server, IncomingMessage, ServerResponse } from 'http';
import { authorize } from './auth.js';
import { buildOutboundRequest, forwardRequest, readBody, ROUTE_PREFIX } from './forwarder.js';
import {
  AuthenticationError,
  BodyTooLargeError,
  NetworkError,
  RequestAbortedError,
  normalizeError
} from './errors.js';
import {
  ERROR_BODIES,
  mapProxyError,
  mapTransportFailure,
  mapUpstreamResponse,
  sendEmptyServerError,
  sendPlainText
} from './response-mapper.js';
import type { ProxyState } from './types.js';
import { logger } from '../utils/logger.js';

export interface GateProxyOptions {
  host: string;
  port: number;
}

export interface RouteMatch {
  /** Path after the `/v1/` prefix, still percent-encoded */
  pathSuffix: string;
  /** Query string including the leading `?`, or '' */
  search: string;
}

/**
 * `.` and `..` segments, also percent-encoded. URL parsing would resolve
 * them and move the upstream path out from under `/v1/`.
 */
function isDotSegment(segment: string): boolean {
  const decoded = segment.toLowerCase().replace(/%2e/g, '.');
  return decoded === '.' || decoded === '..';
}

/**
 * Match `/v1/<rest>` with a non-empty `<rest>` free of dot segments.
 * Backslashes count as separators, as they do in http URLs.
 */
export function matchRoute(requestUrl: string): RouteMatch | null {
  const queryIndex = requestUrl.indexOf('?');
  const pathname = queryIndex === -1 ? requestUrl : requestUrl.slice(0, queryIndex);
  const search = queryIndex === -1 ? '' : requestUrl.slice(queryIndex);

  if (!pathname.startsWith(ROUTE_PREFIX)) {
    return null;
  }

  const pathSuffix = pathname.slice(ROUTE_PREFIX.length);
  if (pathSuffix.length === 0 || pathSuffix.split(/[/\\]/).some(isDotSegment)) {
    return null;
  }

  return { pathSuffix, search };
}

/**
 * The per-request pipeline. Failures end this request only; anything
 * unexpected propagates to the caller's top-level handler.
 */
export async function handleGateRequest(
  state: ProxyState,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const route = matchRoute(req.url ?? '/');
  if (!route) {
    sendPlainText(res, 404, ERROR_BODIES[404]);
    return;
  }

  const auth = authorize(req.headers, state.keys);
  if (!auth.authorized) {
    logger.debug(`[auth] Rejected ${req.method} ${req.url}: ${auth.reason} bearer key`);
    mapProxyError(res, new AuthenticationError('Unauthorized', { reason: auth.reason }));
    return;
  }

  let body: Buffer;
  try {
    body = await readBody(req, state.maxBodyBytes);
  } catch (error) {
    const proxyError = normalizeError(error);
    logger.debug(`[proxy] Rejected body of ${req.method} ${req.url}: ${proxyError.message}`);
    if (proxyError instanceof BodyTooLargeError) {
      // The rest of the body is unread; don't reuse the connection
      res.setHeader('Connection', 'close');
    }
    mapProxyError(res, proxyError);
    return;
  }

  const outbound = buildOutboundRequest(state, req, route.pathSuffix, route.search, body);

  // Abandon the upstream call if the caller hangs up first
  const controller = new AbortController();
  const onClose = (): void => {
    if (!res.writableFinished) controller.abort();
  };
  res.once('close', onClose);

  try {
    const upstream = await forwardRequest(state, outbound, controller.signal);
    mapUpstreamResponse(res, upstream);
  } catch (error) {
    if (error instanceof RequestAbortedError) {
      logger.debug(`[proxy] Client disconnected: ${req.method} ${req.url}`);
      return;
    }
    if (error instanceof NetworkError) {
      mapTransportFailure(res, error);
      return;
    }
    throw error;
  } finally {
    res.off('close', onClose);
  }
}

/**
 * HTTP listener around the gate pipeline
 */
export class GateProxy {
  private server: Server | null = null;
  private actualPort = 0;

  constructor(
    private readonly state: ProxyState,
    private readonly options: GateProxyOptions
  ) {}

  /**
   * Start listening. Rejects on bind failure (EADDRINUSE, EACCES, ...).
   */
  async start(): Promise<{ port: number; url: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('[proxy] Unhandled request error', error);
        sendEmptyServerError(res);
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server = null;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    const address = server.address();
    if (typeof address === 'object' && address) {
      this.actualPort = address.port;
    }

    const url = `http://${this.options.host}:${this.actualPort}`;
    logger.debug(`Proxy started: ${url}`);
    return { port: this.actualPort, url };
  }

  /** Bound port, once listening */
  get port(): number {
    return this.actualPort;
  }

  /**
   * Stop accepting connections and release pooled upstream sockets
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          logger.debug('Proxy stopped');
          resolve();
        });
        server.closeIdleConnections();
      });
    }

    this.state.httpClient.close();
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();

    res.once('finish', () => {
      logger.info(
        `[proxy] ${req.method} ${req.url} -> ${res.statusCode} (${Date.now() - startTime}ms)`,
        { headers: req.headers }
      );
    });

    await handleGateRequest(this.state, req, res);
  }
}
