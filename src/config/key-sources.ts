/**
 * API key sources
 *
 * Each source resolves the full, ordered list of valid keys once at
 * startup. The proxy only ever sees the resulting list.
 */

import { readFile } from 'fs/promises';
import Database from 'better-sqlite3';
import { KeySourceError, getErrorMessage } from '../utils/errors.js';
import type { KeySelection } from './types.js';

export interface KeySource {
  readonly name: string;
  resolveKeys(): Promise<string[]>;
}

/**
 * Split on the given separators, trim, and drop empty entries
 */
export function splitKeys(raw: string, separators: RegExp = /,/): string[] {
  return raw
    .split(separators)
    .map(key => key.trim())
    .filter(key => key.length > 0);
}

/**
 * Comma-separated list, typically the API_KEYS variable or --api-keys flag
 */
export class EnvKeySource implements KeySource {
  readonly name = 'list';

  constructor(private readonly value: string | readonly string[] | undefined) {}

  async resolveKeys(): Promise<string[]> {
    if (this.value === undefined) {
      return [];
    }
    if (typeof this.value === 'string') {
      return splitKeys(this.value);
    }
    return this.value.flatMap(entry => splitKeys(entry));
  }
}

/**
 * Flat file with keys separated by commas and/or line breaks
 */
export class FileKeySource implements KeySource {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async resolveKeys(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new KeySourceError(
        this.name,
        `failed to read API keys file '${this.path}': ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
    return splitKeys(content, /[,\n\r]/);
  }
}

/**
 * SQLite database with a table `api_keys(key TEXT)`, read in row order
 */
export class SqliteKeySource implements KeySource {
  readonly name = 'sqlite';

  constructor(private readonly path: string) {}

  async resolveKeys(): Promise<string[]> {
    let db: Database.Database;
    try {
      db = new Database(this.path, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new KeySourceError(
        this.name,
        `failed to open sqlite database '${this.path}': ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    try {
      const rows: unknown[] = db.prepare('SELECT key FROM api_keys').pluck().all();
      return rows.filter((key): key is string => typeof key === 'string');
    } catch (error) {
      throw new KeySourceError(
        this.name,
        `query on api_keys failed in '${this.path}': ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      db.close();
    }
  }
}

/**
 * Pick the key source by precedence: sqlite > file > list
 */
export function selectKeySource(selection: KeySelection): KeySource {
  if (selection.sqlite !== undefined) {
    return new SqliteKeySource(selection.sqlite);
  }
  if (selection.file !== undefined) {
    return new FileKeySource(selection.file);
  }
  return new EnvKeySource(selection.list);
}
