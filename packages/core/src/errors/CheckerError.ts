/**
 * Error categories raised while checking a VLAN range.
 *
 * `config`, `auth`, `enumeration` and `cancelled` end the run.
 * `fetch` and `parse` are recovered from inside the checker.
 */
export type CheckerErrorKind =
  | 'config'
  | 'auth'
  | 'enumeration'
  | 'fetch'
  | 'parse'
  | 'cancelled';

/**
 * Base class for every error the checker raises
 */
export abstract class CheckerError extends Error {
  abstract readonly kind: CheckerErrorKind;

  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or incomplete configuration */
export class ConfigError extends CheckerError {
  readonly kind = 'config' as const;
}

/** Token request failed or returned no token */
export class AuthError extends CheckerError {
  readonly kind = 'auth' as const;
}

/** Device list could not be retrieved */
export class EnumerationError extends CheckerError {
  readonly kind = 'enumeration' as const;
}

/** A single device's VLAN table could not be retrieved */
export class FetchError extends CheckerError {
  readonly kind = 'fetch' as const;

  constructor(
    message: string,
    public readonly deviceId: string,
    cause?: Error
  ) {
    super(message, cause);
  }
}

/** A VLAN number that does not coerce to an integer */
export class ParseError extends CheckerError {
  readonly kind = 'parse' as const;
}

/** The operator interrupted the run */
export class CancelledError extends CheckerError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Operation cancelled by user') {
    super(message);
  }
}

export function isCheckerError(error: unknown): error is CheckerError {
  return error instanceof CheckerError;
}

/**
 * Render an unknown thrown value as a one-line message, including the
 * underlying cause that undici attaches to `fetch failed` errors.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}
