/**
 * Human-readable descriptions of recorded events.
 * Output is deterministic: it feeds step comments in generated code.
 */

import type {
  AssertionEvent,
  CaptureConfig,
  ClickEvent,
  ConditionConfig,
  ConditionOperator,
  ConditionalEvent,
  CustomJsEvent,
  GroupEvent,
  InputEvent,
  LoopConfig,
  LoopEvent,
  NavigationEvent,
  Operand,
  RecordedEvent,
  TryCatchEvent,
} from "../types/index.js";
import { bestSelector, describeElement, hasText, truncateText } from "./elements.js";

export const OPERATOR_SYMBOLS: Readonly<Record<ConditionOperator, string>> = {
  EQUALS: "==",
  NOT_EQUALS: "!=",
  GREATER_THAN: ">",
  LESS_THAN: "<",
  GREATER_THAN_OR_EQUALS: ">=",
  LESS_THAN_OR_EQUALS: "<=",
  CONTAINS: "contains",
  NOT_CONTAINS: "does not contain",
  STARTS_WITH: "starts with",
  ENDS_WITH: "ends with",
  MATCHES: "matches pattern",
  IS_TRUE: "is true",
  IS_FALSE: "is false",
};

export function describeOperand(operand: Operand): string {
  switch (operand.type) {
    case "LITERAL":
      return `"${operand.value}"`;
    case "VARIABLE":
      return `\${${operand.variableName}}`;
    case "ELEMENT": {
      if (!operand.element) {
        return "Unknown element";
      }
      const selector = bestSelector(operand.element) ?? "unknown";
      return hasText(operand.property)
        ? `Element ${selector}.${operand.property}`
        : `Element ${selector}`;
    }
  }
}

export function describeCondition(condition: ConditionConfig): string {
  if (hasText(condition.expression)) {
    return condition.expression;
  }
  if (!condition.left) {
    return "Invalid condition";
  }

  let text = `${describeOperand(condition.left)} ${OPERATOR_SYMBOLS[condition.operator]}`;
  if (condition.right) {
    text += ` ${describeOperand(condition.right)}`;
  } else if (
    condition.operator !== "IS_TRUE" &&
    condition.operator !== "IS_FALSE"
  ) {
    text += " NULL";
  }

  return condition.negated ? `NOT (${text})` : text;
}

function loopHeadline(loop: LoopConfig): string {
  switch (loop.loopType) {
    case "COUNT":
      return `Repeat ${loop.count ?? 0} times with ${loop.iterationVariable} as counter`;
    case "WHILE":
      return `Repeat while ${loop.condition ? describeCondition(loop.condition) : "condition is true"}`;
    case "UNTIL":
      return `Repeat until ${loop.condition ? describeCondition(loop.condition) : "condition is true"}`;
    case "FOR_EACH": {
      let text = `For each item in data source ${loop.dataSourceId ?? "unknown"}`;
      if (hasText(loop.dataSourcePath)) {
        text += ` at path ${loop.dataSourcePath}`;
      }
      return `${text} as ${loop.iterationVariable}`;
    }
  }
}

export function describeLoop(loop: LoopConfig): string {
  const text = loopHeadline(loop);
  return loop.maxIterations !== undefined
    ? `${text} (max ${loop.maxIterations} iterations)`
    : text;
}

function describeClick(event: ClickEvent): string {
  let clickType = "Click";
  if (event.doubleClick) {
    clickType = "Double click";
  } else if (event.button === "RIGHT") {
    clickType = "Right click";
  } else if (event.button === "MIDDLE") {
    clickType = "Middle click";
  }

  let modifiers = "";
  if (event.ctrlKey) modifiers += "Ctrl+";
  if (event.shiftKey) modifiers += "Shift+";
  if (event.altKey) modifiers += "Alt+";
  if (event.metaKey) modifiers += "Meta+";

  const target = bestSelector(event.element) ?? "unknown element";
  return `${modifiers}${clickType} on ${target}`;
}

function describeInput(event: InputEvent): string {
  const target = bestSelector(event.element) ?? "unknown element";

  if (event.inputType === "FILE" && event.selectedFiles) {
    return `Upload ${event.selectedFiles.length} file(s) to ${target}`;
  }
  if (event.passwordField && event.masked) {
    return `Enter password in ${target}`;
  }
  return `Enter '${truncateText(event.value ?? "", 20)}' in ${target}`;
}

function describeNavigation(event: NavigationEvent): string {
  if (event.back) {
    return `Navigate back to ${event.targetUrl}`;
  }
  if (event.forward) {
    return `Navigate forward to ${event.targetUrl}`;
  }
  if (event.refresh) {
    return `Refresh page ${event.targetUrl}`;
  }
  if (event.redirect) {
    return `Redirect from ${event.sourceUrl ?? "unknown"} to ${event.targetUrl}`;
  }
  return `Navigate to ${event.targetUrl}`;
}

function phrase(negated: boolean, positive: string, negative: string): string {
  return negated ? negative : positive;
}

function assertionBody(event: AssertionEvent): string {
  const not = event.negated === true;
  const target = describeElement(event.element);
  const expected = `'${event.expectedValue ?? ""}'`;
  const equals = phrase(not, "equals", "does not equal");
  const contains = phrase(not, "contains", "does not contain");

  switch (event.assertionType) {
    case "PRESENT":
    case "VISIBLE":
    case "ENABLED":
    case "SELECTED":
      return `${target} is ${not ? "not " : ""}${event.assertionType.toLowerCase()}`;
    case "TEXT_EQUALS":
      return `${target} text ${equals} ${expected}`;
    case "TEXT_CONTAINS":
      return `${target} text ${contains} ${expected}`;
    case "ATTRIBUTE_EQUALS":
      return `${target} attribute '${event.attributeName ?? ""}' ${equals} ${expected}`;
    case "ATTRIBUTE_CONTAINS":
      return `${target} attribute '${event.attributeName ?? ""}' ${contains} ${expected}`;
    case "URL":
      return `URL ${equals} ${expected}`;
    case "URL_CONTAINS":
      return `URL ${contains} ${expected}`;
    case "TITLE":
      return `Page title ${equals} ${expected}`;
    case "TITLE_CONTAINS":
      return `Page title ${contains} ${expected}`;
    case "EQUALS":
      return event.tolerance !== undefined
        ? `${target} value ${equals} ${expected} within ${event.tolerance}`
        : `${target} value ${equals} ${expected}`;
    case "CONTAINS":
      return `${target} value ${contains} ${expected}`;
    case "STARTS_WITH":
      return `${target} value ${phrase(not, "starts with", "does not start with")} ${expected}`;
    case "ENDS_WITH":
      return `${target} value ${phrase(not, "ends with", "does not end with")} ${expected}`;
    case "REGEX_MATCH":
      return `${target} value ${phrase(not, "matches pattern", "does not match pattern")} ${expected}`;
    case "GREATER_THAN":
      return `${target} value is ${not ? "not " : ""}greater than ${expected}`;
    case "LESS_THAN":
      return `${target} value is ${not ? "not " : ""}less than ${expected}`;
    case "GREATER_THAN_OR_EQUALS":
      return `${target} value is ${not ? "not " : ""}greater than or equal to ${expected}`;
    case "LESS_THAN_OR_EQUALS":
      return `${target} value is ${not ? "not " : ""}less than or equal to ${expected}`;
    case "COUNT_EQUALS":
      return `count of ${target} ${equals} ${expected}`;
    case "COUNT_GREATER_THAN":
      return `count of ${target} is ${not ? "not " : ""}greater than ${expected}`;
    case "COUNT_LESS_THAN":
      return `count of ${target} is ${not ? "not " : ""}less than ${expected}`;
    case "CUSTOM_JAVASCRIPT":
      return hasText(event.customMessage)
        ? `custom script passes: ${event.customMessage}`
        : "custom script passes";
  }
}

function describeAssertion(event: AssertionEvent): string {
  let text = `Assert that ${assertionBody(event)}`;
  if (event.status && event.status !== "NOT_EXECUTED") {
    text += ` (${event.status})`;
  }
  return text;
}

export function describeCapture(capture: CaptureConfig): string {
  let text = "Capture ";
  const expression = capture.expression ?? "";
  const property = capture.property ?? "";

  switch (capture.source) {
    case "ELEMENT":
      text += `element ${bestSelector(capture.element) ?? capture.selector ?? "unknown"}`;
      if (capture.method === "PROPERTY") {
        text += `.${capture.property ?? "textContent"}`;
      } else if (capture.method === "ATTRIBUTE") {
        text += ` attribute '${property}'`;
      }
      break;
    case "RESPONSE":
      text += "response data using ";
      if (capture.method === "JSON_PATH") {
        text += `JSONPath expression '${expression}'`;
      } else if (capture.method === "XPATH") {
        text += `XPath expression '${expression}'`;
      } else {
        text += capture.method.toLowerCase().replace(/_/g, " ");
      }
      break;
    case "JAVASCRIPT":
      text += `JavaScript result from '${expression}'`;
      break;
    case "URL":
      text += "current URL";
      if (capture.method === "REGEX") {
        text += ` using regex '${expression}'`;
      }
      break;
    case "COOKIE":
      text += `cookie '${property}'`;
      break;
    case "STORAGE":
      text += `storage item '${property}'`;
      break;
  }

  const variable = hasText(capture.variableName)
    ? capture.variableName
    : "undefined";
  return `${text} into variable ${capture.global ? "global." : ""}${variable}`;
}

function describeCustomJs(event: CustomJsEvent): string {
  let text = "Execute custom JavaScript";
  if (hasText(event.description)) {
    text += `: ${event.description}`;
  }
  if (event.useElementContext && event.contextElement) {
    text += ` on element ${bestSelector(event.contextElement) ?? "unknown"}`;
  }
  if (event.returnVariables && event.returnVariables.length > 0) {
    text += `, returning ${event.returnVariables.join(", ")}`;
  }
  if (event.async) {
    text += " (async)";
  }
  return text;
}

function describeGroup(event: GroupEvent): string {
  const name = hasText(event.name) ? event.name : "Unnamed group";
  let text = `Group: ${name} (${event.events.length} step(s))`;
  if (hasText(event.description)) {
    text += ` - ${event.description}`;
  }
  return text;
}

function describeLoopEvent(event: LoopEvent): string {
  return `Loop: ${describeLoop(event.loop)} with ${event.events.length} steps`;
}

function describeConditional(event: ConditionalEvent): string {
  if (!event.condition) {
    return "Invalid condition";
  }
  let text = `If ${describeCondition(event.condition)} then execute ${event.thenEvents.length} step(s)`;
  if (event.elseEvents.length > 0) {
    text += ` else execute ${event.elseEvents.length} step(s)`;
  }
  return text;
}

function describeTryCatch(event: TryCatchEvent): string {
  let text = `Try-catch block: Try ${event.tryEvents.length} step(s)`;
  if (event.catchEvents.length > 0) {
    text += `, catch ${event.catchEvents.length} step(s)`;
  }
  if (event.finallyEvents.length > 0) {
    text += `, finally ${event.finallyEvents.length} step(s)`;
  }
  if (event.catchErrorTypes && event.catchErrorTypes.length > 0) {
    text += ` (catching ${event.catchErrorTypes.join(", ")})`;
  }
  return text;
}

/**
 * Describe any event. An explicit description replaces the generated
 * text, except for groups and custom scripts which fold it in.
 */
export function describeEvent(event: RecordedEvent): string {
  if (event.type === "GROUP") {
    return describeGroup(event);
  }
  if (event.type === "CUSTOM_JS") {
    return describeCustomJs(event);
  }
  if (hasText(event.description)) {
    return event.description;
  }

  switch (event.type) {
    case "CLICK":
      return describeClick(event);
    case "INPUT":
      return describeInput(event);
    case "NAVIGATION":
      return describeNavigation(event);
    case "ASSERTION":
      return describeAssertion(event);
    case "CAPTURE":
      return describeCapture(event.capture);
    case "LOOP":
      return describeLoopEvent(event);
    case "CONDITIONAL":
      return describeConditional(event);
    case "TRY_CATCH":
      return describeTryCatch(event);
  }
}
