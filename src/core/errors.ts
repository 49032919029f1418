/**
 * Core Errors
 */

/**
 * A core operation was called with arguments it never accepts
 * (e.g. a coordinate outside the buffer). Indicates a bug in the caller.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Deleting past the end of the buffer: there is no next line to merge.
 */
export class BufferRangeError extends PreconditionError {
  constructor(message: string) {
    super(message);
    this.name = 'BufferRangeError';
  }
}

/**
 * Reading or writing the buffer's file failed.
 */
export class BufferFileError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BufferFileError';
    this.path = path;
  }
}

/**
 * A command line could not be run: unknown command or bad arguments.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * The built-in configuration is missing or malformed, or a setting has no
 * value after loading.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Get a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
