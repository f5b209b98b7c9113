import chalk from 'chalk';
import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { join } from 'path';
import { sanitizeLogArgs } from './sanitize.js';
import { getGatePath } from './paths.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Append-only daily log file under `<gate home>/logs/`.
 *
 * The file name carries the UTC date, so a gate left running past
 * midnight moves on to a new file with its next entry.
 */
class DailyLogFile {
  private stream: WriteStream | null = null;
  private currentPath: string | null = null;
  private disabled = false;

  /** Path for today's file, opening it if needed; null when file logging is off */
  path(): string | null {
    this.ensureOpen();
    return this.disabled ? null : this.currentPath;
  }

  append(line: string): void {
    this.ensureOpen();
    this.stream?.write(line);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
    this.currentPath = null;
    this.disabled = false;
  }

  private ensureOpen(): void {
    if (this.disabled) return;

    const day = new Date().toISOString().slice(0, 10);
    const logsDir = getGatePath('logs');
    const wanted = join(logsDir, `debug-${day}.log`);
    if (this.stream && this.currentPath === wanted) return;

    this.stream?.end();
    try {
      mkdirSync(logsDir, { recursive: true });
      const stream = createWriteStream(wanted, { flags: 'a' });
      stream.on('error', () => {
        // Disk full or directory removed: keep going on the console
        this.stream = null;
        this.disabled = true;
      });
      this.stream = stream;
      this.currentPath = wanted;
    } catch {
      this.stream = null;
      this.currentPath = null;
      this.disabled = true;
    }
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ? `${error.message}\n${error.stack}` : error.message;
  }
  return String(error);
}

function formatArgs(args: unknown[]): string {
  if (args.length === 0) return '';
  const parts = sanitizeLogArgs(...args).map(arg =>
    typeof arg === 'object' && arg !== null && !(arg instanceof Error)
      ? JSON.stringify(arg)
      : String(arg)
  );
  return ` ${parts.join(' ')}`;
}

class Logger {
  private readonly file = new DailyLogFile();

  private record(level: LogLevel, message: string, args: unknown[]): void {
    const stamp = new Date().toISOString();
    this.file.append(`[${stamp}] [${level.toUpperCase()}] ${message}${formatArgs(args)}\n`);
  }

  /**
   * Console verbosity only; the file always gets every level
   */
  isDebugMode(): boolean {
    const flag = process.env.OLLAMA_GATE_DEBUG;
    return flag === 'true' || flag === '1';
  }

  getLogFilePath(): string | null {
    return this.file.path();
  }

  /** Flush the current file. Logging after this reopens it. */
  close(): void {
    this.file.close();
  }

  debug(message: string, ...args: unknown[]): void {
    this.record(LogLevel.DEBUG, message, args);
    if (this.isDebugMode()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...sanitizeLogArgs(...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.record(LogLevel.INFO, message, args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.record(LogLevel.WARN, message, args);
    console.warn(chalk.yellow(`⚠ ${message}`), ...sanitizeLogArgs(...args));
  }

  error(message: string, error?: unknown): void {
    this.record(LogLevel.ERROR, message, error === undefined ? [] : [describeError(error)]);

    console.error(chalk.red(`✗ ${message}`));
    if (error === undefined) return;

    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    if (this.isDebugMode() && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  }
}

export const logger = new Logger();
