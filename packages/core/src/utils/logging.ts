/**
 * Centralized logging utility with configurable log levels
 */

// Log levels in order of verbosity
export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4
}

/**
 * Parse a log level from a string such as "3" or "debug".
 * @returns The level, or undefined when the value is not a known level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const normalized = value.trim();
  const numeric = Number(normalized);
  if (Number.isInteger(numeric)) {
    return numeric >= LogLevel.NONE && numeric <= LogLevel.DEBUG
      ? numeric
      : undefined;
  }

  switch (normalized.toLowerCase()) {
    case "none":
      return LogLevel.NONE;
    case "error":
      return LogLevel.ERROR;
    case "warn":
      return LogLevel.WARN;
    case "info":
      return LogLevel.INFO;
    case "debug":
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

// Default log level - can be overridden via environment variable
let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;

/**
 * Set the current log level
 * @param level The log level to set
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
  debug(`Log level set to: ${LogLevel[level]}`);
}

/**
 * Get the current log level
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Log an error message
 */
export function error(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.ERROR) {
    console.error("[ERROR]", ...args);
  }
}

/**
 * Log a warning message
 */
export function warn(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.WARN) {
    console.warn("[WARN]", ...args);
  }
}

/**
 * Log an info message
 */
export function info(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(...args);
  }
}

/**
 * Log a debug message
 */
export function debug(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.DEBUG) {
    console.log("[DEBUG]", ...args);
  }
}
