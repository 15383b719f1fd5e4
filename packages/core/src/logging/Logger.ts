/**
 * Logging sink used by the controller client and the checker.
 * The CLI supplies a console implementation; tests use a recording one.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info(): void {},
  warn(): void {},
  error(): void {},
  debug(): void {},
};
