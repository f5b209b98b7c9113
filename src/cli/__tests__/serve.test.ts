import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { createServeCommand, toOverrides } from '../commands/serve.js';
import type { ConfigOverrides } from '../../config/types.js';

async function parse(args: string[]): Promise<ConfigOverrides[]> {
  const calls: ConfigOverrides[] = [];
  const command = createServeCommand(async overrides => {
    calls.push(overrides);
  });
  command.exitOverride();
  command.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  await command.parseAsync(args, { from: 'user' });
  return calls;
}

describe('serve command', () => {
  it('should pass no overrides when no flags are given', async () => {
    await expect(parse([])).resolves.toEqual([{}]);
  });

  it('should map every flag to its override', async () => {
    const calls = await parse([
      '--ollama-url', 'http://gpu-box:11434',
      '--api-keys', 'k1, k2',
      '--api-keys-file', '/etc/gate/keys.txt',
      '--api-keys-sqlite', '/etc/gate/keys.db',
      '--proxy-host', '127.0.0.1',
      '--proxy-port', '8080'
    ]);

    expect(calls).toEqual([{
      ollamaUrl: 'http://gpu-box:11434',
      proxyHost: '127.0.0.1',
      proxyPort: 8080,
      apiKeysSqlite: '/etc/gate/keys.db',
      apiKeysFile: '/etc/gate/keys.txt',
      apiKeys: ['k1', 'k2']
    }]);
  });

  it('should accumulate repeated --api-keys flags', async () => {
    const calls = await parse(['--api-keys', 'a', '--api-keys', 'b,c']);
    expect(calls).toEqual([{ apiKeys: ['a', 'b', 'c'] }]);
  });

  it('should reject a port that is out of range', async () => {
    const result = parse(['--proxy-port', '70000']);

    await expect(result).rejects.toBeInstanceOf(CommanderError);
    await expect(result).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('should reject a port that is not a number', async () => {
    await expect(parse(['--proxy-port', 'http'])).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});

describe('toOverrides', () => {
  it('should leave unset options out', () => {
    expect(toOverrides({ proxyPort: 0 })).toEqual({ proxyPort: 0 });
    expect(Object.keys(toOverrides({ ollamaUrl: undefined }))).toEqual([]);
  });
});
