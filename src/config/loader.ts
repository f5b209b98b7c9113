/**
 * Configuration resolution
 *
 * Priority: command-line overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `OLLAMA_URL` upstream base URL (default: http://127.0.0.1:11434)
 * - `PROXY_HOST` / `PROXY_PORT` listen address, an IP literal and port
 *   (default: 0.0.0.0:3000)
 * - `API_KEYS_SQLITE` SQLite database with table `api_keys(key TEXT)`
 * - `API_KEYS_FILE` file of comma- or newline-separated keys
 * - `API_KEYS` comma-separated keys
 *
 * Only one key source is read: sqlite, else file, else the list.
 */

import { z } from 'zod';
import { selectKeySource } from './key-sources.js';
import type { AppConfig, ConfigOverrides, KeySelection } from './types.js';
import { ConfigurationError } from '../utils/errors.js';
import { normalizeUpstreamUrl } from '../proxy/state.js';

export const DEFAULT_OLLAMA_URL = 'http://127.0.0.1:11434';
export const DEFAULT_PROXY_HOST = '0.0.0.0';
export const DEFAULT_PROXY_PORT = 3000;

function hasHttpScheme(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const upstreamUrlSchema = z
  .string()
  .url('must be an absolute URL')
  .refine(hasHttpScheme, 'must use http or https');

const listenAddressSchema = z.object({
  host: z.string().trim().ip({ message: 'host must be an IPv4 or IPv6 address' }),
  port: z.number().int().min(0).max(65535)
});

/**
 * Parse a TCP port, or return the fallback when the value is absent or
 * not a port number
 */
export function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return fallback;
  }
  const port = Number(value.trim());
  return port <= 65535 ? port : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}

function validateUpstreamUrl(value: string): string {
  const result = upstreamUrlSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid upstream URL '${value}': ${result.error.issues.map(issue => issue.message).join(', ')}`,
      'OLLAMA_URL'
    );
  }
  return normalizeUpstreamUrl(value);
}

function validateListenAddress(host: string, port: number): { host: string; port: number } {
  const result = listenAddressSchema.safeParse({ host, port });
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid listen address '${host}:${port}': ${result.error.issues.map(issue => issue.message).join(', ')}`,
      'PROXY_HOST'
    );
  }
  return result.data;
}

async function resolveKeys(selection: KeySelection): Promise<{ keys: string[]; source: string }> {
  const source = selectKeySource(selection);
  const keys = await source.resolveKeys();
  return { keys, source: source.name };
}

/**
 * Load configuration from the environment and its key source
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const ollamaUrl = validateUpstreamUrl(nonEmpty(env.OLLAMA_URL) ?? DEFAULT_OLLAMA_URL);

  const { host, port } = validateListenAddress(
    nonEmpty(env.PROXY_HOST) ?? DEFAULT_PROXY_HOST,
    parsePort(env.PROXY_PORT, DEFAULT_PROXY_PORT)
  );

  const { keys, source } = await resolveKeys({
    sqlite: nonEmpty(env.API_KEYS_SQLITE),
    file: nonEmpty(env.API_KEYS_FILE),
    list: env.API_KEYS
  });

  return Object.freeze({
    validKeys: Object.freeze(keys),
    ollamaUrl,
    proxyHost: host,
    proxyPort: port,
    keySource: source
  });
}

/**
 * Apply the overrides that are set. Any key override replaces the whole
 * key list (sqlite > file > list among the overrides). A host without a
 * port keeps the loaded port, and the other way round.
 */
export async function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides
): Promise<AppConfig> {
  const ollamaUrl = overrides.ollamaUrl !== undefined
    ? validateUpstreamUrl(overrides.ollamaUrl)
    : config.ollamaUrl;

  const { host, port } = validateListenAddress(
    overrides.proxyHost ?? config.proxyHost,
    overrides.proxyPort ?? config.proxyPort
  );

  let validKeys = config.validKeys;
  let keySource = config.keySource;
  if (
    overrides.apiKeysSqlite !== undefined ||
    overrides.apiKeysFile !== undefined ||
    overrides.apiKeys !== undefined
  ) {
    const resolved = await resolveKeys({
      sqlite: overrides.apiKeysSqlite,
      file: overrides.apiKeysFile,
      list: overrides.apiKeys
    });
    validKeys = Object.freeze(resolved.keys);
    keySource = resolved.source;
  }

  return Object.freeze({
    validKeys,
    ollamaUrl,
    proxyHost: host,
    proxyPort: port,
    keySource
  });
}

/**
 * Environment first, then command-line overrides on top
 */
export async function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  return applyOverrides(await loadConfig(env), overrides);
}
