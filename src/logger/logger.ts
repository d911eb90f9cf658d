/**
 * Micro-logger wrapper: minimal logging with level filtering
 * No external dependencies, wraps console.*
 */

import type { LogLevel, Logger } from "@/types";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL, ENV_LOG_LEVEL } from "@/constants";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Read from environment, default to 'info'; the entry point may override
const envLevel = process.env[ENV_LOG_LEVEL]?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL;

/**
 * Change the active level for every logger in the process
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: Record<string, unknown>): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Record<string, unknown>): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Record<string, unknown>): void {
  log("error", message, meta);
}

/**
 * The module logger as a Logger value, for injection into engine components
 */
export const rootLogger: Logger = { debug, info, warn, error };

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(
  context: Record<string, unknown>,
  base: Logger = rootLogger,
): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...context, ...meta }),
    info: (message, meta) => base.info(message, { ...context, ...meta }),
    warn: (message, meta) => base.warn(message, { ...context, ...meta }),
    error: (message, meta) => base.error(message, { ...context, ...meta }),
  };
}

/**
 * Render an unknown throwable for log meta
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
