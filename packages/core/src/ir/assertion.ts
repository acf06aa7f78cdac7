/**
 * Assertion evaluation against an observed value.
 */

import type {
  AssertionEvent,
  AssertionStatus,
  AssertionType,
} from "../types/index.js";

export type ActualValue = string | number | boolean | null | undefined;

export interface AssertionOutcome {
  passed: boolean;
  status: AssertionStatus;
}

type Comparison = boolean | "error";

const STATE_TYPES: ReadonlySet<AssertionType> = new Set([
  "PRESENT",
  "VISIBLE",
  "ENABLED",
  "SELECTED",
]);

function isTruthy(actual: ActualValue): boolean {
  if (typeof actual === "boolean") {
    return actual;
  }
  if (typeof actual === "number") {
    return actual !== 0 && !Number.isNaN(actual);
  }
  if (typeof actual === "string") {
    return actual.length > 0 && actual.toLowerCase() !== "false";
  }
  return false;
}

function toNumber(value: string | number | boolean): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return Number.NaN;
  }
  return value.trim().length === 0 ? Number.NaN : Number(value);
}

function compareNumbers(
  actual: string | number | boolean,
  expected: string,
  compare: (a: number, e: number) => boolean
): Comparison {
  const a = toNumber(actual);
  const e = toNumber(expected);
  if (Number.isNaN(a) || Number.isNaN(e)) {
    return "error";
  }
  return compare(a, e);
}

function compilePattern(pattern: string, flags: string): RegExp | undefined {
  try {
    return new RegExp(`^(?:${pattern})$`, flags);
  } catch (error) {
    console.error("Invalid assertion pattern:", error);
    return undefined;
  }
}

function compareValues(
  assertion: AssertionEvent,
  actualRaw: string | number | boolean,
  expected: string
): Comparison {
  const caseSensitive = assertion.caseSensitive === true;
  const actualText = String(actualRaw);
  const a = caseSensitive ? actualText : actualText.toLowerCase();
  const e = caseSensitive ? expected : expected.toLowerCase();

  switch (assertion.assertionType) {
    case "EQUALS":
    case "TEXT_EQUALS":
    case "ATTRIBUTE_EQUALS":
    case "URL":
    case "TITLE":
      if (assertion.numeric || assertion.tolerance !== undefined) {
        const tolerance = assertion.tolerance ?? 0;
        return compareNumbers(
          actualRaw,
          expected,
          (x, y) => Math.abs(x - y) <= tolerance
        );
      }
      return a === e;
    case "CONTAINS":
    case "TEXT_CONTAINS":
    case "ATTRIBUTE_CONTAINS":
    case "URL_CONTAINS":
    case "TITLE_CONTAINS":
      return a.includes(e);
    case "STARTS_WITH":
      return a.startsWith(e);
    case "ENDS_WITH":
      return a.endsWith(e);
    case "REGEX_MATCH": {
      const pattern = compilePattern(expected, caseSensitive ? "" : "i");
      return pattern ? pattern.test(actualText) : "error";
    }
    case "GREATER_THAN":
    case "COUNT_GREATER_THAN":
      return compareNumbers(actualRaw, expected, (x, y) => x > y);
    case "LESS_THAN":
    case "COUNT_LESS_THAN":
      return compareNumbers(actualRaw, expected, (x, y) => x < y);
    case "GREATER_THAN_OR_EQUALS":
      return compareNumbers(actualRaw, expected, (x, y) => x >= y);
    case "LESS_THAN_OR_EQUALS":
      return compareNumbers(actualRaw, expected, (x, y) => x <= y);
    case "COUNT_EQUALS":
      return compareNumbers(actualRaw, expected, (x, y) => x === y);
    case "PRESENT":
    case "VISIBLE":
    case "ENABLED":
    case "SELECTED":
    case "CUSTOM_JAVASCRIPT":
      return isTruthy(actualRaw);
  }
}

/**
 * Decide whether an observed value satisfies an assertion.
 * Negation flips the final result; an ERROR is never flipped.
 */
export function evaluateAssertion(
  assertion: AssertionEvent,
  actual: ActualValue
): AssertionOutcome {
  let result: Comparison;

  if (
    STATE_TYPES.has(assertion.assertionType) ||
    assertion.assertionType === "CUSTOM_JAVASCRIPT"
  ) {
    result = isTruthy(actual);
  } else {
    const expected = assertion.expectedValue;
    if (
      actual !== null &&
      actual !== undefined &&
      expected !== null &&
      expected !== undefined
    ) {
      result = compareValues(assertion, actual, expected);
    } else {
      // both absent counts as equal, one absent as different
      result =
        (actual === null || actual === undefined) &&
        (expected === null || expected === undefined);
    }
  }

  if (result === "error") {
    return { passed: false, status: "ERROR" };
  }

  const passed = assertion.negated ? !result : result;
  return { passed, status: passed ? "PASSED" : "FAILED" };
}

/**
 * Copy of the assertion carrying the outcome and the observed value.
 */
export function applyAssertionResult(
  assertion: AssertionEvent,
  actual: ActualValue
): AssertionEvent {
  const { status } = evaluateAssertion(assertion, actual);
  return {
    ...assertion,
    status,
    actualValue: actual === null || actual === undefined ? null : String(actual),
  };
}
