/**
 * @testcast/core
 *
 * Event IR, recording sessions, wire schemas and shared utilities.
 */

export * from "./types/index.js";
export * from "./ir/index.js";
export * from "./session/index.js";
export * from "./wire/index.js";
export { redactJson, truncateJson, redactForLog } from "./utils/redact.js";
export { loadConfig, type Config, type LogLevel } from "./config.js";
export * from "./logger.js";
