/**
 * Namespaced logging. Every layer takes a Logger so hosts can route output
 * wherever they like; the console logger is the default.
 */

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  prefix?: string;
  /** Debug lines are dropped unless enabled */
  debug?: boolean;
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? "[context-fusion]";
  const debugEnabled = opts.debug ?? false;

  const write = (
    fn: (...args: unknown[]) => void,
    message: string,
    data?: Record<string, unknown>,
  ): void => {
    if (data) fn(`${prefix} ${message}`, data);
    else fn(`${prefix} ${message}`);
  };

  return {
    debug(message, data) {
      if (!debugEnabled) return;
      write(console.debug, message, data);
    },
    info(message, data) { write(console.info, message, data); },
    warn(message, data) { write(console.warn, message, data); },
    error(message, data) { write(console.error, message, data); },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
