#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { createServeCommand } from './commands/serve.js';

const program = new Command();

// Read version from package.json
let version = '0.0.0';
try {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version: string };
  version = packageJson.version;
} catch {
  // Use default version if unable to read
}

program
  .name('ollama-gate')
  .description('Authenticating reverse proxy for a local inference service')
  .version(version);

program.addCommand(createServeCommand(), { isDefault: true });

await program.parseAsync(process.argv);
