/**
 * Per-kind validity rules.
 * Containers are checked on their own fields only; each child is judged
 * separately when the tree is rendered.
 */

import type {
  AssertionEvent,
  AssertionType,
  CaptureConfig,
  ConditionConfig,
  CustomJsEvent,
  InputEvent,
  LoopConfig,
  RecordedEvent,
  TryCatchEvent,
} from "../types/index.js";
import { bestSelector, hasText } from "./elements.js";

/** Names that end up as variables in generated code */
export const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

function identifierErrors(name: string | undefined, label: string): string[] {
  if (!hasText(name)) {
    return [`${label} is required`];
  }
  return IDENTIFIER_PATTERN.test(name) ? [] : [`${label} "${name}" is not a valid identifier`];
}

/** Assertion types that read page state rather than a target element */
const ELEMENTLESS_ASSERTIONS: ReadonlySet<AssertionType> = new Set([
  "URL",
  "URL_CONTAINS",
  "TITLE",
  "TITLE_CONTAINS",
  "CUSTOM_JAVASCRIPT",
]);

export function validateLoopConfig(loop: LoopConfig): string[] {
  const errors: string[] = [];

  switch (loop.loopType) {
    case "COUNT":
      if (loop.count === undefined) {
        errors.push("Count is required for COUNT loop type");
      } else if (loop.count < 0) {
        errors.push("Count must be a positive number");
      }
      break;
    case "WHILE":
    case "UNTIL":
      if (!loop.condition) {
        errors.push(`Condition is required for ${loop.loopType} loop type`);
      }
      break;
    case "FOR_EACH":
      if (!hasText(loop.dataSourceId)) {
        errors.push("Data source ID is required for FOR_EACH loop type");
      }
      break;
  }

  errors.push(...identifierErrors(loop.iterationVariable, "Iteration variable name"));
  if (loop.maxIterations !== undefined && loop.maxIterations <= 0) {
    errors.push("Maximum iterations must be a positive number");
  }

  return errors;
}

export function validateCondition(condition: ConditionConfig): string[] {
  const errors: string[] = [];
  if (!hasText(condition.expression) && !condition.left) {
    errors.push("Condition needs a left operand or an expression");
  }
  for (const operand of [condition.left, condition.right]) {
    if (operand?.type === "VARIABLE") {
      errors.push(...identifierErrors(operand.variableName, "Operand variable name"));
    }
  }
  return errors;
}

export function validateCaptureConfig(capture: CaptureConfig): string[] {
  const errors: string[] = [];

  errors.push(...identifierErrors(capture.variableName, "Variable name"));

  switch (capture.source) {
    case "ELEMENT":
      if (capture.method === "PROPERTY" && !hasText(capture.property)) {
        errors.push("Property is required for element property capture");
      }
      if (!capture.element && !hasText(capture.selector)) {
        errors.push(
          "Either target element or selector is required for element capture"
        );
      }
      break;
    case "RESPONSE":
      if (
        (capture.method === "JSON_PATH" || capture.method === "XPATH") &&
        !hasText(capture.expression)
      ) {
        errors.push("Expression is required for response capture");
      }
      break;
    case "JAVASCRIPT":
      if (!hasText(capture.expression)) {
        errors.push(
          "JavaScript expression is required for JavaScript capture"
        );
      }
      break;
    case "URL":
    case "COOKIE":
    case "STORAGE":
      break;
  }

  return errors;
}

function validateInput(event: InputEvent): string[] {
  const errors: string[] = [];
  if (bestSelector(event.element) === undefined) {
    errors.push("Input target has no selector");
  }
  const hasFiles =
    event.inputType === "FILE" &&
    event.selectedFiles !== undefined &&
    event.selectedFiles.length > 0;
  if (event.value === undefined && !hasFiles) {
    errors.push("Input needs a value or selected files");
  }
  return errors;
}

function validateAssertion(event: AssertionEvent): string[] {
  const errors: string[] = [];
  if (!event.element && !ELEMENTLESS_ASSERTIONS.has(event.assertionType)) {
    errors.push(`${event.assertionType} assertion needs a target element`);
  }
  if (
    (event.assertionType === "ATTRIBUTE_EQUALS" ||
      event.assertionType === "ATTRIBUTE_CONTAINS") &&
    !hasText(event.attributeName)
  ) {
    errors.push("Attribute assertion needs an attribute name");
  }
  if (event.assertionType === "CUSTOM_JAVASCRIPT" && !hasText(event.script)) {
    errors.push("Custom JavaScript assertion needs a script");
  }
  if (event.tolerance !== undefined && event.tolerance < 0) {
    errors.push("Tolerance must not be negative");
  }
  return errors;
}

function validateCustomJs(event: CustomJsEvent): string[] {
  const errors: string[] = [];
  if (!hasText(event.script)) {
    errors.push("JavaScript code is required");
  }
  if (event.timeoutMs !== undefined && event.timeoutMs <= 0) {
    errors.push("Timeout must be a positive number");
  }
  if (event.useElementContext && !event.contextElement) {
    errors.push("Context element is required when using element context");
  }
  return errors;
}

function validateTryCatch(event: TryCatchEvent): string[] {
  const errors: string[] = [];
  if (event.tryEvents.length === 0) {
    errors.push("Try block must contain at least one event");
  }
  errors.push(...identifierErrors(event.errorVariable, "Error variable name"));
  return errors;
}

/**
 * List everything wrong with a single event. Empty means valid.
 */
export function validationErrors(event: RecordedEvent): string[] {
  switch (event.type) {
    case "CLICK":
      return bestSelector(event.element) === undefined
        ? ["Click target has no selector"]
        : [];
    case "INPUT":
      return validateInput(event);
    case "NAVIGATION":
      return hasText(event.targetUrl) ? [] : ["Target URL is required"];
    case "ASSERTION":
      return validateAssertion(event);
    case "CAPTURE":
      return validateCaptureConfig(event.capture);
    case "CUSTOM_JS":
      return validateCustomJs(event);
    case "GROUP":
      return hasText(event.name) ? [] : ["Group name is required"];
    case "LOOP":
      return validateLoopConfig(event.loop);
    case "CONDITIONAL":
      return event.condition
        ? validateCondition(event.condition)
        : ["Condition configuration is required"];
    case "TRY_CATCH":
      return validateTryCatch(event);
  }
}

export function isValid(event: RecordedEvent): boolean {
  return validationErrors(event).length === 0;
}
