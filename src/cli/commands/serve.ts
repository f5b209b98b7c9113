import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../config/loader.js';
import type { ConfigOverrides } from '../../config/types.js';
import { createProxyState } from '../../proxy/state.js';
import { GateProxy } from '../../proxy/server.js';
import { logger } from '../../utils/logger.js';

export interface ServeOptions {
  ollamaUrl?: string;
  apiKeys?: string[];
  apiKeysFile?: string;
  apiKeysSqlite?: string;
  proxyHost?: string;
  proxyPort?: number;
}

export type ServeAction = (overrides: ConfigOverrides) => Promise<void>;

function parsePortOption(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Port must be a number between 0 and 65535.');
  }
  const port = Number(value);
  if (port > 65535) {
    throw new InvalidArgumentError('Port must be a number between 0 and 65535.');
  }
  return port;
}

function parseKeyList(value: string, previous: string[] | undefined): string[] {
  const keys = value.split(',').map(key => key.trim()).filter(key => key.length > 0);
  return [...(previous ?? []), ...keys];
}

/**
 * Map parsed flags to config overrides, leaving unset flags out
 */
export function toOverrides(options: ServeOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.ollamaUrl !== undefined) overrides.ollamaUrl = options.ollamaUrl;
  if (options.proxyHost !== undefined) overrides.proxyHost = options.proxyHost;
  if (options.proxyPort !== undefined) overrides.proxyPort = options.proxyPort;
  if (options.apiKeysSqlite !== undefined) overrides.apiKeysSqlite = options.apiKeysSqlite;
  if (options.apiKeysFile !== undefined) overrides.apiKeysFile = options.apiKeysFile;
  if (options.apiKeys !== undefined) overrides.apiKeys = options.apiKeys;
  return overrides;
}

/**
 * Resolve configuration, build the shared state and start listening
 */
export async function startGate(overrides: ConfigOverrides): Promise<GateProxy> {
  const config = await resolveConfig(overrides);

  if (config.validKeys.length === 0) {
    logger.warn('No API keys configured; every request will be rejected with 401');
  }

  const state = createProxyState({
    keys: config.validKeys,
    upstreamUrl: config.ollamaUrl
  });
  const proxy = new GateProxy(state, { host: config.proxyHost, port: config.proxyPort });
  const { port } = await proxy.start();

  logger.success(`Listening on ${config.proxyHost}:${port}`);
  console.log(`  Upstream: ${chalk.cyan(config.ollamaUrl)}`);
  console.log(`  Keys:     ${chalk.cyan(String(config.validKeys.length))} ${chalk.dim(`(${config.keySource})`)}`);
  logger.info('[serve] Proxy started', {
    upstream: config.ollamaUrl,
    host: config.proxyHost,
    port,
    keyCount: config.validKeys.length,
    keySource: config.keySource
  });

  return proxy;
}

/**
 * Start the gate and stop it cleanly on SIGINT/SIGTERM
 */
async function serveUntilSignal(overrides: ConfigOverrides): Promise<void> {
  let proxy: GateProxy;
  try {
    proxy = await startGate(overrides);
  } catch (error: unknown) {
    logger.error('Failed to start proxy:', error);
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.debug(`[serve] Received ${signal}, shutting down`);
    proxy.stop().then(
      () => {
        logger.close();
        process.exit(0);
      },
      (error: unknown) => {
        logger.error('Error while stopping proxy:', error);
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export function createServeCommand(action: ServeAction = serveUntilSignal): Command {
  const command = new Command('serve');

  command
    .description('Start the authenticating proxy in front of the inference service')
    .option('--ollama-url <url>', 'Base URL for the Ollama service (overrides OLLAMA_URL)')
    .option('--api-keys <keys>', 'Comma-separated API keys (overrides API_KEYS, API_KEYS_FILE and API_KEYS_SQLITE)', parseKeyList)
    .option('--api-keys-file <path>', 'File of comma- or newline-separated API keys')
    .option('--api-keys-sqlite <path>', 'SQLite database with table api_keys(key TEXT)')
    .option('--proxy-host <host>', 'IP address to bind the proxy to (overrides PROXY_HOST)')
    .option('--proxy-port <port>', 'Port to bind the proxy to (overrides PROXY_PORT)', parsePortOption)
    .action(async (options: ServeOptions) => {
      await action(toOverrides(options));
    });

  return command;
}
