import type { LogLevel } from "@interconnect/protocol";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/**
 * Logging sink shared by router components. Tests inject `vi.fn()` sinks.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger with a `[tag]` prefix. The level is read on every call so a
 * hot-reloaded `logLevel` takes effect immediately.
 */
export function createConsoleLogger(tag: string, level: () => LogLevel = () => "info"): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_RANK[candidate] >= LEVEL_RANK[level()];
  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`[${tag}] ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`[${tag}] ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`[${tag}] ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`[${tag}] ${message}`, ...details);
    },
  };
}

/** Discards everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
