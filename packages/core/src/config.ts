/**
 * Configuration management.
 * Reads from environment variables with sensible defaults.
 */

import type { Language } from "./types/index.js";
import { isLanguage } from "./types/index.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Config {
  /** Port for the service to listen on (default: 8790) */
  listenPort: number;

  /** Interface to bind (default: 127.0.0.1) */
  host: string;

  /** Admission cap for new sessions (default: 1000) */
  maxEventCount: number;

  /** Generated scripts kept in the codegen cache (default: 100) */
  codegenCacheSize: number;

  /** Language used when a request does not name one (default: javascript) */
  defaultLanguage: Language;

  /** Framework used when a request does not name one (default: playwright) */
  defaultFramework: string;

  /** Minimum level for scoped loggers (default: info) */
  logLevel: LogLevel;

  /** Enable Fastify's request logger */
  httpLogger: boolean;

  /** Keys to redact from agent-reported payloads before logging */
  redactKeys: string[];
}

const DEFAULT_REDACT_KEYS = [
  "authorization",
  "sessionKey",
  "key",
  "token",
  "access_token",
  "secret",
  "password",
  "cookie",
];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? "", 10);
  return Number.isNaN(value) || value <= 0 ? fallback : value;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(): Config {
  const listenPort = parsePositiveInt(process.env["TC_LISTEN_PORT"], 8790);
  const host = process.env["TC_HOST"] ?? "127.0.0.1";
  const maxEventCount = parsePositiveInt(
    process.env["TC_MAX_EVENT_COUNT"],
    1000
  );
  const codegenCacheSize = parsePositiveInt(
    process.env["TC_CODEGEN_CACHE_SIZE"],
    100
  );
  const languageRaw = process.env["TC_DEFAULT_LANGUAGE"] ?? "javascript";
  const defaultLanguage = isLanguage(languageRaw) ? languageRaw : "javascript";
  const defaultFramework = process.env["TC_DEFAULT_FRAMEWORK"] ?? "playwright";
  const logLevel = parseLogLevel(process.env["TC_LOG_LEVEL"]);
  const httpLogger = process.env["TC_HTTP_LOGGER"] === "1";
  const redactKeysRaw = process.env["TC_REDACT_KEYS"];
  const redactKeys = redactKeysRaw
    ? redactKeysRaw.split(",").map((k) => k.trim())
    : DEFAULT_REDACT_KEYS;

  return {
    listenPort,
    host,
    maxEventCount,
    codegenCacheSize,
    defaultLanguage,
    defaultFramework,
    logLevel,
    httpLogger,
    redactKeys,
  };
}
