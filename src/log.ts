/**
 * Console logging with a global level threshold.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

let threshold: LogLevel = "warn";

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return (
    level !== "silent" &&
    LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
  );
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger whose messages carry a "[name]" prefix.
 */
export function createLogger(name: string): Logger {
  const prefix = `[${name}]`;
  return {
    debug(message) {
      if (isLevelEnabled("debug")) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (isLevelEnabled("info")) console.info(`${prefix} ${message}`);
    },
    warn(message) {
      if (isLevelEnabled("warn")) console.warn(`${prefix} ${message}`);
    },
    error(message) {
      if (isLevelEnabled("error")) console.error(`${prefix} ${message}`);
    },
  };
}
