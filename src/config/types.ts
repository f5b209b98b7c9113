/**
 * Where API keys come from. At most one is used, by precedence
 * sqlite > file > list.
 */
export interface KeySelection {
  sqlite?: string;
  file?: string;
  list?: string | readonly string[];
}

/**
 * Fully resolved configuration, read-only once loaded
 */
export interface AppConfig {
  readonly validKeys: readonly string[];
  /** Upstream inference service base URL, no trailing slash */
  readonly ollamaUrl: string;
  readonly proxyHost: string;
  readonly proxyPort: number;
  /** Which key source produced validKeys */
  readonly keySource: string;
}

/**
 * Values supplied on the command line. Each one set takes precedence over
 * the environment.
 */
export interface ConfigOverrides {
  ollamaUrl?: string;
  proxyHost?: string;
  proxyPort?: number;
  apiKeysSqlite?: string;
  apiKeysFile?: string;
  apiKeys?: string[];
}
