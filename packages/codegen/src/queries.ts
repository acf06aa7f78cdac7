/**
 * Assertion and capture renderers built on a framework's PageQueries.
 * Frameworks that can answer a query get the statement for free; a query
 * answering null leaves the step unsupported.
 */

import { describeEvent } from "@testcast/core";
import type {
  AssertionEvent,
  AssertionType,
  CaptureEvent,
  CaptureSource,
} from "@testcast/core";
import type {
  AssertionSubject,
  PageQueries,
  RenderContext,
  RenderFn,
  Target,
} from "./context.js";
import type { CompareOperator } from "./languages/types.js";

interface BuiltAssertion {
  expr: string;
  subject: AssertionSubject;
}

type TextComparison = "equals" | "contains" | "startsWith" | "endsWith";

function expectedText(
  event: AssertionEvent,
  ignoreCase: boolean,
  ctx: RenderContext
): string {
  const { ops } = ctx.syntax;
  const raw = event.expectedValue ?? "";
  if (ctx.variableRef(raw) !== null) {
    const value = ctx.value(raw);
    return ignoreCase ? ops.lower(value) : value;
  }
  return ctx.str(ignoreCase ? raw.toLowerCase() : raw);
}

function compareText(
  kind: TextComparison,
  actual: string | null,
  event: AssertionEvent,
  ctx: RenderContext
): string | null {
  if (actual === null) {
    return null;
  }
  const { ops } = ctx.syntax;
  const ignoreCase = event.caseSensitive !== true;
  const text = ops.toString(actual);
  const a = ignoreCase ? ops.lower(text) : text;
  const e = expectedText(event, ignoreCase, ctx);
  switch (kind) {
    case "equals":
      return ops.equals(a, e);
    case "contains":
      return ops.contains(a, e);
    case "startsWith":
      return ops.startsWith(a, e);
    case "endsWith":
      return ops.endsWith(a, e);
  }
}

function compareNumber(
  actual: string | null,
  op: CompareOperator,
  event: AssertionEvent,
  ctx: RenderContext
): string | null {
  if (actual === null) {
    return null;
  }
  return ctx.syntax.ops.compare(actual, op, ctx.numberValue(event.expectedValue));
}

function equalsValue(
  actual: string | null,
  event: AssertionEvent,
  ctx: RenderContext
): string | null {
  if (actual === null) {
    return null;
  }
  const { ops } = ctx.syntax;
  if (event.tolerance !== undefined) {
    const difference = `${ops.toNumber(actual)} - ${ctx.numberValue(event.expectedValue)}`;
    return ops.compare(ops.abs(difference), "<=", String(event.tolerance));
  }
  if (event.numeric) {
    return compareNumber(ops.toNumber(actual), "==", event, ctx);
  }
  return compareText("equals", actual, event, ctx);
}

function elementQuery(
  event: AssertionEvent,
  ctx: RenderContext,
  query: (queries: PageQueries, target: Target) => string | null
): string | null {
  const queries = ctx.profile.queries;
  const target = ctx.target(event.element);
  return queries && target ? query(queries, target) : null;
}

function buildAssertion(
  event: AssertionEvent,
  ctx: RenderContext
): BuiltAssertion | null {
  const queries = ctx.profile.queries;
  if (!queries) {
    return null;
  }
  const { ops } = ctx.syntax;
  const text = (): string | null => elementQuery(event, ctx, (q, t) => q.text(t));
  const count = (): string | null =>
    elementQuery(event, ctx, (q, t) => q.count(t));
  const attribute = (): string | null =>
    elementQuery(event, ctx, (q, t) => q.attribute(t, event.attributeName ?? ""));
  const onElement = (expr: string | null): BuiltAssertion | null =>
    expr === null ? null : { expr, subject: "element" };

  switch (event.assertionType) {
    case "PRESENT": {
      const c = count();
      return onElement(c === null ? null : ops.compare(c, ">", "0"));
    }
    case "VISIBLE":
      return onElement(elementQuery(event, ctx, (q, t) => q.visible(t)));
    case "ENABLED":
      return onElement(elementQuery(event, ctx, (q, t) => q.enabled(t)));
    case "SELECTED":
      return onElement(elementQuery(event, ctx, (q, t) => q.selected(t)));
    case "TEXT_EQUALS":
      return onElement(compareText("equals", text(), event, ctx));
    case "TEXT_CONTAINS":
      return onElement(compareText("contains", text(), event, ctx));
    case "ATTRIBUTE_EQUALS":
      return onElement(compareText("equals", attribute(), event, ctx));
    case "ATTRIBUTE_CONTAINS":
      return onElement(compareText("contains", attribute(), event, ctx));
    case "URL":
    case "URL_CONTAINS": {
      const kind = event.assertionType === "URL" ? "equals" : "contains";
      const expr = compareText(kind, queries.url(), event, ctx);
      return expr === null ? null : { expr, subject: "url" };
    }
    case "TITLE":
    case "TITLE_CONTAINS": {
      const kind = event.assertionType === "TITLE" ? "equals" : "contains";
      const expr = compareText(kind, queries.title(), event, ctx);
      return expr === null ? null : { expr, subject: "title" };
    }
    case "EQUALS":
      return onElement(equalsValue(text(), event, ctx));
    case "CONTAINS":
      return onElement(compareText("contains", text(), event, ctx));
    case "STARTS_WITH":
      return onElement(compareText("startsWith", text(), event, ctx));
    case "ENDS_WITH":
      return onElement(compareText("endsWith", text(), event, ctx));
    case "REGEX_MATCH": {
      const actual = text();
      return onElement(
        actual === null
          ? null
          : ops.fullMatch(
              ops.toString(actual),
              ctx.value(event.expectedValue),
              event.caseSensitive !== true
            )
      );
    }
    case "GREATER_THAN":
      return onElement(compareNumber(numeric(text(), ctx), ">", event, ctx));
    case "LESS_THAN":
      return onElement(compareNumber(numeric(text(), ctx), "<", event, ctx));
    case "GREATER_THAN_OR_EQUALS":
      return onElement(compareNumber(numeric(text(), ctx), ">=", event, ctx));
    case "LESS_THAN_OR_EQUALS":
      return onElement(compareNumber(numeric(text(), ctx), "<=", event, ctx));
    case "COUNT_EQUALS":
      return onElement(compareNumber(count(), "==", event, ctx));
    case "COUNT_GREATER_THAN":
      return onElement(compareNumber(count(), ">", event, ctx));
    case "COUNT_LESS_THAN":
      return onElement(compareNumber(count(), "<", event, ctx));
    case "CUSTOM_JAVASCRIPT": {
      const value = queries.evaluate(event.script ?? "");
      return value === null ? null : { expr: ops.truthy(value), subject: "script" };
    }
  }
}

function numeric(expr: string | null, ctx: RenderContext): string | null {
  return expr === null ? null : ctx.syntax.ops.toNumber(expr);
}

function renderAssertion(event: AssertionEvent, ctx: RenderContext): string[] | null {
  const built = buildAssertion(event, ctx);
  if (!built) {
    return null;
  }
  const expr = event.negated ? ctx.syntax.ops.not(built.expr) : built.expr;
  const message = event.customMessage ?? describeEvent(event);
  return ctx.profile.assertTrue
    ? ctx.profile.assertTrue(expr, message, built.subject, ctx)
    : [ctx.syntax.assertTrue(expr, message)];
}

const ASSERTION_TYPES: readonly AssertionType[] = [
  "PRESENT",
  "VISIBLE",
  "ENABLED",
  "SELECTED",
  "TEXT_EQUALS",
  "TEXT_CONTAINS",
  "ATTRIBUTE_EQUALS",
  "ATTRIBUTE_CONTAINS",
  "URL",
  "URL_CONTAINS",
  "TITLE",
  "TITLE_CONTAINS",
  "EQUALS",
  "CONTAINS",
  "STARTS_WITH",
  "ENDS_WITH",
  "REGEX_MATCH",
  "GREATER_THAN",
  "LESS_THAN",
  "GREATER_THAN_OR_EQUALS",
  "LESS_THAN_OR_EQUALS",
  "COUNT_EQUALS",
  "COUNT_GREATER_THAN",
  "COUNT_LESS_THAN",
  "CUSTOM_JAVASCRIPT",
];

/** One renderer per assertion type, all backed by the profile's queries */
export const QUERY_ASSERTIONS: Readonly<Record<string, RenderFn<"ASSERTION">>> =
  Object.fromEntries(
    ASSERTION_TYPES.map((type): [string, RenderFn<"ASSERTION">] => [
      type,
      renderAssertion,
    ])
  );

function captureExpression(event: CaptureEvent, ctx: RenderContext): string | null {
  const queries = ctx.profile.queries;
  if (!queries) {
    return null;
  }
  const capture = event.capture;
  switch (capture.source) {
    case "ELEMENT": {
      let target: Target | null = null;
      if (capture.element) {
        target = ctx.target(capture.element);
      } else if (capture.selector) {
        target = ctx.targetFromSelector(capture.selector);
      }
      if (!target) {
        return null;
      }
      switch (capture.method) {
        case "ATTRIBUTE":
          return queries.attribute(target, capture.property ?? "");
        case "PROPERTY":
          return queries.property(target, capture.property ?? "textContent");
        case "INNER_HTML":
          return queries.property(target, "innerHTML");
        default:
          return queries.text(target);
      }
    }
    case "RESPONSE":
      return queries.response(capture.method, capture.expression ?? "");
    case "JAVASCRIPT":
      return queries.evaluate(capture.expression ?? "");
    case "URL": {
      const url = queries.url();
      if (url === null || capture.method !== "REGEX" || !capture.expression) {
        return url;
      }
      const { ops } = ctx.syntax;
      return ops.regexGroup(ops.toString(url), ctx.str(capture.expression));
    }
    case "COOKIE":
      return queries.cookie(capture.property ?? "");
    case "STORAGE":
      return queries.storage(capture.property ?? "");
  }
}

function renderCapture(event: CaptureEvent, ctx: RenderContext): string[] | null {
  const expr = captureExpression(event, ctx);
  if (expr === null) {
    return null;
  }
  const { ops } = ctx.syntax;
  const { defaultValue, variableName } = event.capture;
  const value =
    defaultValue !== undefined
      ? ops.toString(ops.withDefault(expr, ctx.str(defaultValue)))
      : ops.toString(expr);
  return [ctx.assign(variableName, value, "STRING")];
}

const CAPTURE_SOURCES: readonly CaptureSource[] = [
  "ELEMENT",
  "RESPONSE",
  "JAVASCRIPT",
  "URL",
  "COOKIE",
  "STORAGE",
];

/** One renderer per capture source, all backed by the profile's queries */
export const QUERY_CAPTURES: Readonly<Record<string, RenderFn<"CAPTURE">>> =
  Object.fromEntries(
    CAPTURE_SOURCES.map((source): [string, RenderFn<"CAPTURE">] => [
      source,
      renderCapture,
    ])
  );
