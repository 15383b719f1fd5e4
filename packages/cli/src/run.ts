import type { Dispatcher } from 'undici';
import {
  CancelledError,
  ControllerClient,
  VlanChecker,
  describeError,
  formatBanner,
  formatReport,
  formatReportJson,
  isCheckerError,
  loadCheckerConfig,
  rangeOf,
  type Logger,
} from '@vlan-range-checker/core';
import { USAGE, parseArgs } from './args.js';
import { createConsoleLogger, type LogStream } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** Receives the banner and report */
  stdout?: LogStream;
  /** Receives log lines when no logger is given */
  stderr?: LogStream;
  logger?: Logger;
  /** undici dispatcher handed to the controller client */
  dispatcher?: Dispatcher;
  /** Aborted on SIGINT */
  signal?: AbortSignal;
}

/**
 * Run one VLAN range check and return the process exit code.
 * Every fatal error is reported here; nothing is rethrown.
 */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const print = (lines: string[]): void => {
    for (const line of lines) stdout.write(`${line}\n`);
  };

  let logger = options.logger ?? createConsoleLogger({ stream: options.stderr });

  try {
    const args = parseArgs(argv);
    if (args.help) {
      print([USAGE]);
      return EXIT_OK;
    }
    if (!options.logger && args.verbose) {
      logger = createConsoleLogger({ stream: options.stderr, verbose: true });
    }

    const config = loadCheckerConfig({
      path: args.configPath,
      overrides: args.overrides,
      env: options.env,
    });
    const range = rangeOf(config);

    const client = new ControllerClient(config, {
      dispatcher: options.dispatcher,
      logger,
    });

    if (!args.json) {
      print(formatBanner(client.baseUrl, range));
    }

    try {
      const checker = new VlanChecker(client, range, {
        logger,
        signal: options.signal,
      });
      const result = await checker.check();
      if (args.json) {
        print([formatReportJson(result)]);
      } else {
        print(formatReport(result));
      }
    } finally {
      await client.close();
    }

    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, logger, options.signal);
  }
}

/**
 * Log a fatal error and pick the exit code for it
 */
function reportFailure(error: unknown, logger: Logger, signal?: AbortSignal): number {
  if (signal?.aborted || error instanceof CancelledError) {
    logger.warn('Operation cancelled by user');
    return EXIT_FAILURE;
  }

  if (!isCheckerError(error)) {
    logger.error(
      `An error occurred: ${describeError(error)}`,
      error instanceof Error ? error : undefined
    );
    return EXIT_FAILURE;
  }

  switch (error.kind) {
    case 'config':
      logger.error(`Configuration error: ${error.message}`);
      break;
    case 'auth':
    case 'enumeration':
      logger.error(`An error occurred: ${error.message}`, error);
      break;
    default:
      // fetch and parse failures are handled per device by the checker
      logger.error(`Unexpected ${error.kind} error: ${error.message}`, error);
  }
  return EXIT_FAILURE;
}
