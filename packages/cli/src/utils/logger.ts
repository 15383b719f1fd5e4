import type { Logger } from '@vlan-range-checker/core';

export interface LogStream {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  /** Destination for log lines; stderr keeps stdout free for the report */
  stream?: LogStream;
  /** Emit debug lines and error stacks */
  verbose?: boolean;
  /** Timestamp source, overridable in tests */
  now?: () => Date;
}

/**
 * Logger utility for the command line
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const verbose = options.verbose ?? false;
  const now = options.now ?? (() => new Date());

  const write = (level: string, message: string): void => {
    stream.write(`[${now().toISOString()}] ${level}: ${message}\n`);
  };

  return {
    info(message: string): void {
      write('INFO', message);
    },

    warn(message: string): void {
      write('WARN', message);
    },

    error(message: string, error?: Error): void {
      write('ERROR', message);
      if (verbose && error?.stack) {
        stream.write(`${error.stack}\n`);
      }
    },

    debug(message: string): void {
      if (verbose) write('DEBUG', message);
    },
  };
}
