/**
 * Structured logging utility
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data);
  }
  return String(data);
}

export function formatMessage(prefix: string, message: string, data?: unknown): string {
  const base = `[${prefix}] ${message}`;
  if (data === undefined) return base;
  return `${base} ${formatData(data)}`;
}

export function createLogger(prefix: string): Logger {
  return {
    debug(message: string, data?: unknown) {
      if (enabled("debug")) console.log(formatMessage(prefix, message, data));
    },
    info(message: string, data?: unknown) {
      if (enabled("info")) console.log(formatMessage(prefix, message, data));
    },
    warn(message: string, data?: unknown) {
      if (enabled("warn")) console.warn(formatMessage(prefix, message, data));
    },
    error(message: string, data?: unknown) {
      if (enabled("error")) console.error(formatMessage(prefix, message, data));
    },
  };
}
