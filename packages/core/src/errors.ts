/**
 * Base class for errors raised by refmt itself (as opposed to errors bubbling up from fs).
 */
export class RefmtError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RefmtError';
  }
}

/**
 * Invalid caller input: bad word filter, bad glob, conflicting options.
 * Always raised before any file is read or written.
 */
export class ConfigurationError extends RefmtError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class PathNotFoundError extends RefmtError {
  readonly path: string;

  constructor(path: string) {
    super(`Path '${path}' does not exist.`);
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
