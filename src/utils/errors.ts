export class GateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GateError';
  }
}

export class ConfigurationError extends GateError {
  constructor(message: string, public readonly setting?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure to resolve API keys from a backing store (file read, SQLite open or query)
 */
export class KeySourceError extends GateError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly originalError?: Error
  ) {
    super(`${source}: ${message}`);
    this.name = 'KeySourceError';
  }
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read the errno-style `code` of a Node error, if it carries one
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
