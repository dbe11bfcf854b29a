/**
 * Logger - Minimal leveled logging for core services
 *
 * Core classes take a Logger so the CLI decides where messages go and
 * whether debug output is shown.
 *
 * @module utils/logger
 */

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Prefix prepended to every line */
  prefix?: string;
  /** Emit debug messages */
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? '[glyphdeck]';
  const debug = options.debug ?? false;

  return {
    error: (msg) => console.error(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    info: (msg) => console.info(`${prefix} ${msg}`),
    debug: (msg) => {
      if (debug) {
        console.debug(`${prefix} DEBUG: ${msg}`);
      }
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
