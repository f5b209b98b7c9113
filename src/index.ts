// Main exports for the ollama-gate package

// Proxy pipeline
export { GateProxy, handleGateRequest, matchRoute } from './proxy/server.js';
export type { GateProxyOptions, RouteMatch } from './proxy/server.js';
export { createProxyState, normalizeUpstreamUrl } from './proxy/state.js';
export type { ProxyStateOptions } from './proxy/state.js';
export { authorize, extractBearerKey } from './proxy/auth.js';
export {
  buildOutboundRequest,
  buildTargetUrl,
  forwardRequest,
  readBody,
  resolveMethod,
  DEFAULT_MAX_BODY_BYTES,
  ROUTE_PREFIX
} from './proxy/forwarder.js';
export {
  mapUpstreamResponse,
  mapTransportFailure,
  resolveStatusCode
} from './proxy/response-mapper.js';
export { filterHeaders, EXCLUDED_REQUEST_HEADERS } from './proxy/headers.js';
export { ProxyHTTPClient } from './proxy/http-client.js';
export * from './proxy/errors.js';
export type * from './proxy/types.js';

// Configuration
export { loadConfig, applyOverrides, resolveConfig } from './config/loader.js';
export {
  EnvKeySource,
  FileKeySource,
  SqliteKeySource,
  selectKeySource
} from './config/key-sources.js';
export type { KeySource } from './config/key-sources.js';
export type { AppConfig, ConfigOverrides, KeySelection } from './config/types.js';

// Utils
export { logger } from './utils/logger.js';
export * from './utils/errors.js';
