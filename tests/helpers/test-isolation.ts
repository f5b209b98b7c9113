/**
 * Test isolation: point OLLAMA_GATE_HOME at a fresh temp directory per
 * suite so log files never land in the real home directory.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { beforeAll, afterAll } from 'vitest';
import { logger } from '../../src/utils/logger.js';

export function setupTestIsolation(): { getHome: () => string } {
  let home = '';
  let previous: string | undefined;

  beforeAll(() => {
    previous = process.env.OLLAMA_GATE_HOME;
    home = mkdtempSync(join(tmpdir(), 'ollama-gate-test-'));
    process.env.OLLAMA_GATE_HOME = home;
  });

  afterAll(() => {
    logger.close();
    if (previous === undefined) {
      delete process.env.OLLAMA_GATE_HOME;
    } else {
      process.env.OLLAMA_GATE_HOME = previous;
    }
    rmSync(home, { recursive: true, force: true });
  });

  return { getHome: () => home };
}
