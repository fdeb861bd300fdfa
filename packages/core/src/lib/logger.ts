/**
 * Tag prefixed to every log entry written by the SDK
 */
export const LOG_TAG = "[QuickBooks]";

/**
 * Logging capability injected into connections and clients.
 * Any console-compatible object satisfies it.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const noop = (): void => {};

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Logger writing to the process console
 */
export function createConsoleLogger(target: Logger = console): Logger {
  return {
    debug: (message, ...meta) => target.debug(message, ...meta),
    info: (message, ...meta) => target.info(message, ...meta),
    warn: (message, ...meta) => target.warn(message, ...meta),
    error: (message, ...meta) => target.error(message, ...meta),
  };
}
