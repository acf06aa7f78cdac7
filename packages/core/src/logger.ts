/**
 * Logger utility that adds timestamps to console output.
 * Automatically prefixes all console.log/error/warn calls with ISO 8601 timestamps.
 */

import type { LogLevel } from "./config.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let installed = false;
let minimumLevel: LogLevel = "info";

/**
 * Format a timestamp in ISO 8601 format with timezone.
 * Example: 2026-01-03T16:45:23.123Z
 */
function formatTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Install timestamp logging by overriding console methods.
 * All subsequent console.log/error/warn calls will be prefixed with timestamps.
 * Calling it again has no effect.
 */
export function installTimestampLogging(): void {
  if (installed) {
    return;
  }
  installed = true;

  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  console.log = (...args: unknown[]) => {
    originalLog(`[${formatTimestamp()}]`, ...args);
  };

  console.error = (...args: unknown[]) => {
    originalError(`[${formatTimestamp()}]`, ...args);
  };

  console.warn = (...args: unknown[]) => {
    originalWarn(`[${formatTimestamp()}]`, ...args);
  };
}

/** Set the level below which scoped loggers stay quiet */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Console logger that prefixes messages with a scope, e.g. "[ingest]".
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (enabled("debug")) console.log(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}
