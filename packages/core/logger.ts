export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(...args);
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(...args);
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(...args);
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(...args);
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Logger whose lines carry a `[timestamp][scope]` prefix.
 * Level filtering is shared with the module-level functions.
 */
export function createLogger(scope: string): Logger {
  const emit =
    (sink: (...args: unknown[]) => void) =>
    (message: string, meta?: Record<string, unknown>) => {
      const prefix = `[${new Date().toISOString()}][${scope}]`;
      if (meta) {
        sink(prefix, message, meta);
        return;
      }
      sink(prefix, message);
    };
  return {
    debug: emit(debug),
    info: emit(info),
    warn: emit(warn),
    error: emit(error),
  };
}
