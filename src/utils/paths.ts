/**
 * Gate Home Directory Resolution
 *
 * Respects OLLAMA_GATE_HOME for custom locations (and per-suite temp
 * directories in tests).
 *
 * Default: ~/.ollama-gate
 * Override: OLLAMA_GATE_HOME=/custom/path
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Get the gate home directory
 *
 * Priority:
 * 1. OLLAMA_GATE_HOME environment variable
 * 2. ~/.ollama-gate (default)
 *
 * @example
 * process.env.OLLAMA_GATE_HOME = '/tmp/ollama-gate-test-12345';
 * getGateHome() // => '/tmp/ollama-gate-test-12345'
 */
export function getGateHome(): string {
  if (process.env.OLLAMA_GATE_HOME) {
    return process.env.OLLAMA_GATE_HOME;
  }

  return join(homedir(), '.ollama-gate');
}

/**
 * Get path within the gate home directory
 *
 * @example
 * getGatePath('logs') // => '/home/ops/.ollama-gate/logs'
 */
export function getGatePath(...paths: string[]): string {
  return join(getGateHome(), ...paths);
}
