/**
 * Prefixed logger used across the sweep
 */

export const LOG_PREFIX = "[pii-sweep]";

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

/**
 * Wrap a base logger so every line carries the sweep prefix.
 * `debug` is only forwarded when `verbose` is set.
 */
export function createLogger(baseLogger: Logger = consoleLogger, verbose = false): Logger {
  return {
    info: (msg: string) => baseLogger.info(`${LOG_PREFIX} ${msg}`),
    warn: (msg: string) => baseLogger.warn(`${LOG_PREFIX} ${msg}`),
    error: (msg: string) => baseLogger.error(`${LOG_PREFIX} ${msg}`),
    debug: verbose
      ? (msg: string) => baseLogger.debug?.(`${LOG_PREFIX} ${msg}`)
      : undefined,
  };
}

const consoleLogger: Logger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
  debug: (msg) => console.debug(msg),
};

// Logger that drops everything; handy for library callers and tests
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
