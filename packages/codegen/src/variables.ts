/**
 * Helpers for turning variable values into native literals.
 */

import type { LoopConfig } from "@testcast/core";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  return null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // invalid JSON renders as an empty collection
    return undefined;
  }
}

/** Parse an OBJECT variable value; anything but a JSON object gives {} */
export function parseObjectValue(text: string): { [key: string]: JsonValue } {
  const parsed = toJsonValue(parseJson(text));
  return parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)
    ? parsed
    : {};
}

/** Parse an ARRAY variable value; anything but a JSON array gives [] */
export function parseArrayValue(text: string): JsonValue[] {
  const parsed = toJsonValue(parseJson(text));
  return Array.isArray(parsed) ? parsed : [];
}

/** Numeric text for a NUMBER variable; non-numbers become 0 */
export function numberText(text: string): string {
  const value = Number(text.trim());
  return text.trim().length > 0 && Number.isFinite(value) ? String(value) : "0";
}

export function isIntegerText(text: string): boolean {
  const value = Number(text);
  return Number.isSafeInteger(value) && Math.abs(value) <= 2147483647;
}

export function booleanValue(text: string): boolean {
  return text.trim().toLowerCase() === "true";
}

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?$/;

export function isNumericLiteral(text: string): boolean {
  return NUMERIC_LITERAL.test(text.trim());
}

/**
 * Source literal for numeric text, or null when the text is not a plain
 * number. Leading zeros are dropped: `010` is octal in Java and a syntax
 * error in Python.
 */
export function numericLiteral(text: string): string | null {
  return isNumericLiteral(text) ? String(Number(text.trim())) : null;
}

/** Iteration count of a COUNT loop after applying its limit */
export function countLimit(loop: LoopConfig): number {
  const count = Math.max(loop.count ?? 0, 0);
  return loop.maxIterations !== undefined
    ? Math.min(count, loop.maxIterations)
    : count;
}
