// CHANGE: Structured logger with INFO/DEBUG/ERROR levels for launcher stages.
// WHY: Stage transitions are traced at DEBUG, the chosen mode at INFO, failures at ERROR.
// SOURCE: internal reasoning

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

const configuredLevel = process.env.LAUNCHER_LOG_LEVEL ?? "info";
let activeLevel: LogLevel = isLogLevel(configuredLevel) ? configuredLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Narrow arbitrary input (CLI option, env value) to a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit error-level log entry.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
