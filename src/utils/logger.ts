/**
 * Logger Utility
 *
 * Provides debug and error logging without crashing the host app.
 * Debug output is silent unless explicitly enabled.
 *
 * @module utils/logger
 */

/**
 * Logger interface
 */
export interface Logger {
  logDebug(message: string, meta?: unknown): void;
  logInfo(message: string, meta?: unknown): void;
  logWarn(message: string, meta?: unknown): void;
  logError(message: string, error?: unknown): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

/**
 * Create a logger instance
 *
 * @param options - Logger options
 * @returns Logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { debug = false, prefix = "[Tether SDK]" } = options;
  const hasConsole = typeof console !== "undefined";

  return {
    logDebug: (message: string, meta?: unknown) => {
      if (debug && hasConsole) {
        console.log(`${prefix} [DEBUG] ${message}`, meta ?? "");
      }
    },
    logInfo: (message: string, meta?: unknown) => {
      if (hasConsole) {
        console.info(`${prefix} [INFO] ${message}`, meta ?? "");
      }
    },
    logWarn: (message: string, meta?: unknown) => {
      if (hasConsole) {
        console.warn(`${prefix} [WARN] ${message}`, meta ?? "");
      }
    },
    logError: (message: string, error?: unknown) => {
      if (hasConsole) {
        console.error(`${prefix} [ERROR] ${message}`, error ?? "");
      }
    },
  };
}

/**
 * Wrap a logger so every message carries a subsystem tag, e.g. `[TRACK]`
 */
export function tagLogger(logger: Logger, tag: string): Logger {
  const label = `[${tag}]`;
  return {
    logDebug: (message, meta) => logger.logDebug(`${label} ${message}`, meta),
    logInfo: (message, meta) => logger.logInfo(`${label} ${message}`, meta),
    logWarn: (message, meta) => logger.logWarn(`${label} ${message}`, meta),
    logError: (message, error) => logger.logError(`${label} ${message}`, error),
  };
}
