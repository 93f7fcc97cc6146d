/**
 * Micro-logger wrapper
 *
 * Minimal logging with level filtering
 * Wraps console.*; one line per entry: `[timestamp] [LEVEL] message {meta}`
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

/**
 * Resolve a LOG_LEVEL value (case-insensitive), falling back to the default
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return DEFAULT_LOG_LEVEL;
}

const currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env.LOG_LEVEL)];

/**
 * JSON replacer: Error instances would otherwise serialise as {}
 */
function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Format meta object as JSON string (undefined fields are dropped)
 */
export function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta, replaceErrors);
}

/**
 * Build one log line
 */
export function formatLine(level: LogLevel, message: string, meta?: LogMeta, now = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
}

/**
 * Log message if level is enabled
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const line = formatLine(level, message, meta);
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
