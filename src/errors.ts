/**
 * Startup error types.
 *
 * Per-request failures never surface as exceptions; they are modelled as
 * result unions in src/http/types.ts. Only conditions that stop the server
 * from starting are thrown.
 */

export class FatalStartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalStartupError';
  }
}

/**
 * Config file missing, unreadable, or failing validation.
 */
export class ConfigError extends FatalStartupError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The listening socket could not be bound, or the sandbox root is unusable.
 */
export class BindError extends FatalStartupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BindError';
  }
}

// Errors raised by Node's fs bindings may come from another realm (Jest's VM
// sandbox), so these check the shape rather than instanceof Error.

export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
