/**
 * Redaction and truncation utilities for agent-reported data.
 */

const REDACTED_VALUE = "[REDACTED]";
const DEFAULT_MAX_LENGTH = 4096;
const TRUNCATED_MARKER = "...[TRUNCATED]";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively redact sensitive keys from a JSON value.
 * Keys are matched case-insensitively.
 */
export function redactJson(value: unknown, keys: string[]): unknown {
  const lowerKeys = new Set(keys.map((k) => k.toLowerCase()));

  function walk(node: unknown): unknown {
    if (Array.isArray(node)) {
      return node.map(walk);
    }
    if (!isRecord(node)) {
      return node;
    }
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(node)) {
      result[k] = lowerKeys.has(k.toLowerCase()) ? REDACTED_VALUE : walk(v);
    }
    return result;
  }

  return walk(value);
}

/**
 * Stringify and truncate JSON to a maximum length.
 * If truncated, ends with "...[TRUNCATED]".
 */
export function truncateJson(
  value: unknown,
  maxLength: number = DEFAULT_MAX_LENGTH
): string {
  const json = JSON.stringify(value) ?? "undefined";
  if (json.length <= maxLength) {
    return json;
  }
  return json.slice(0, maxLength - TRUNCATED_MARKER.length) + TRUNCATED_MARKER;
}

/** Redact, then truncate, for log lines */
export function redactForLog(
  value: unknown,
  keys: string[],
  maxLength: number = DEFAULT_MAX_LENGTH
): string {
  return truncateJson(redactJson(value, keys), maxLength);
}
