import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import {
  EnvKeySource,
  FileKeySource,
  SqliteKeySource,
  selectKeySource,
  splitKeys
} from '../key-sources.js';
import { KeySourceError } from '../../utils/errors.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'ollama-gate-keys-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function createKeyDatabase(path: string, keys: string[]): void {
  const db = new Database(path);
  db.exec('CREATE TABLE api_keys (key TEXT)');
  const insert = db.prepare('INSERT INTO api_keys (key) VALUES (?)');
  for (const key of keys) {
    insert.run(key);
  }
  db.close();
}

describe('splitKeys', () => {
  it('should trim entries and drop empty ones', () => {
    expect(splitKeys(' a , b,,c ,')).toEqual(['a', 'b', 'c']);
    expect(splitKeys('')).toEqual([]);
  });
});

describe('EnvKeySource', () => {
  it('should split a comma-separated string', async () => {
    await expect(new EnvKeySource('key-1, key-2').resolveKeys()).resolves.toEqual(['key-1', 'key-2']);
  });

  it('should flatten a list of comma-separated entries', async () => {
    await expect(new EnvKeySource(['a,b', 'c']).resolveKeys()).resolves.toEqual(['a', 'b', 'c']);
  });

  it('should resolve to no keys when unset', async () => {
    await expect(new EnvKeySource(undefined).resolveKeys()).resolves.toEqual([]);
  });
});

describe('FileKeySource', () => {
  it('should accept commas and line breaks as separators', async () => {
    const path = join(dir, 'keys.txt');
    writeFileSync(path, 'alpha,beta\r\ngamma\n\n delta \n');

    await expect(new FileKeySource(path).resolveKeys()).resolves.toEqual(['alpha', 'beta', 'gamma', 'delta']);
  });

  it('should fail with a KeySourceError naming the file', async () => {
    const path = join(dir, 'missing.txt');
    const result = new FileKeySource(path).resolveKeys();

    await expect(result).rejects.toBeInstanceOf(KeySourceError);
    await expect(result).rejects.toThrow(`file: failed to read API keys file '${path}'`);
  });
});

describe('SqliteKeySource', () => {
  it('should read every key in row order', async () => {
    const path = join(dir, 'keys.db');
    createKeyDatabase(path, ['first', 'second', 'third']);

    await expect(new SqliteKeySource(path).resolveKeys()).resolves.toEqual(['first', 'second', 'third']);
  });

  it('should skip NULL rows', async () => {
    const path = join(dir, 'keys.db');
    const db = new Database(path);
    db.exec("CREATE TABLE api_keys (key TEXT); INSERT INTO api_keys VALUES ('only'), (NULL);");
    db.close();

    await expect(new SqliteKeySource(path).resolveKeys()).resolves.toEqual(['only']);
  });

  it('should fail when the database does not exist', async () => {
    const path = join(dir, 'missing.db');
    const result = new SqliteKeySource(path).resolveKeys();

    await expect(result).rejects.toBeInstanceOf(KeySourceError);
    await expect(result).rejects.toThrow(`sqlite: failed to open sqlite database '${path}'`);
  });

  it('should fail when the api_keys table is missing', async () => {
    const path = join(dir, 'empty.db');
    const db = new Database(path);
    db.exec('CREATE TABLE other (id INTEGER)');
    db.close();

    await expect(new SqliteKeySource(path).resolveKeys())
      .rejects.toThrow(`sqlite: query on api_keys failed in '${path}'`);
  });
});

describe('selectKeySource', () => {
  it('should prefer sqlite, then file, then the list', () => {
    expect(selectKeySource({ sqlite: 'a.db', file: 'k.txt', list: 'x' }).name).toBe('sqlite');
    expect(selectKeySource({ file: 'k.txt', list: 'x' }).name).toBe('file');
    expect(selectKeySource({ list: 'x' }).name).toBe('list');
    expect(selectKeySource({}).name).toBe('list');
  });
});
