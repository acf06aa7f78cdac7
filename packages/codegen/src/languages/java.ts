import type { Variable, VariableType } from "@testcast/core";
import {
  booleanValue,
  countLimit,
  isIntegerText,
  numberText,
  parseArrayValue,
  parseObjectValue,
} from "../variables.js";
import type { JsonValue } from "../variables.js";
import type { LanguageSyntax, ValueOps } from "./types.js";

const str = (value: string): string => JSON.stringify(value);

function literal(value: JsonValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return str(value);
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `List.of(${value.map(literal).join(", ")})`;
  }
  const entries = Object.entries(value);
  if (entries.length === 0) {
    return "Map.of()";
  }
  const items = entries.map(([k, v]) => `Map.entry(${str(k)}, ${literal(v)})`);
  return `Map.ofEntries(${items.join(", ")})`;
}

function nativeType(type: VariableType, numeric = "int"): string {
  switch (type) {
    case "STRING":
      return "String";
    case "NUMBER":
      return numeric;
    case "BOOLEAN":
      return "boolean";
    case "ARRAY":
      return "List<Object>";
    case "OBJECT":
      return "Object";
  }
}

function declareVariable({ name, type, value }: Variable): string {
  switch (type) {
    case "STRING":
      return `String ${name} = ${str(value)};`;
    case "NUMBER": {
      const text = numberText(value);
      return `${isIntegerText(text) ? "int" : "double"} ${name} = ${text};`;
    }
    case "BOOLEAN":
      return `boolean ${name} = ${booleanValue(value)};`;
    case "OBJECT":
      return `Map<String, Object> ${name} = ${literal(parseObjectValue(value))};`;
    case "ARRAY":
      return `List<Object> ${name} = ${literal(parseArrayValue(value))};`;
  }
}

const ops: ValueOps = {
  toString: (x) => `String.valueOf(${x})`,
  toNumber: (x) => `Double.parseDouble(String.valueOf(${x}))`,
  lower: (x) => `${x}.toLowerCase()`,
  equals: (a, b) => `${a}.equals(${b})`,
  contains: (a, b) => `${a}.contains(${b})`,
  startsWith: (a, b) => `${a}.startsWith(${b})`,
  endsWith: (a, b) => `${a}.endsWith(${b})`,
  fullMatch: (text, pattern, ignoreCase) =>
    ignoreCase
      ? `${text}.matches("(?i)" + ${pattern})`
      : `${text}.matches(${pattern})`,
  regexGroup: (text, pattern) =>
    `Pattern.compile(${pattern}).matcher(${text}).results().map(m -> m.group(1)).findFirst().orElse("")`,
  compare: (a, op, b) => `${a} ${op} ${b}`,
  abs: (x) => `Math.abs(${x})`,
  truthy: (x) => `Boolean.parseBoolean(String.valueOf(${x}))`,
  not: (x) => `!(${x})`,
  withDefault: (x, d) => `Objects.requireNonNullElse(${x}, ${d})`,
  nullLiteral: "null",
  bool: (value) => String(value),
};

export const javaSyntax: LanguageSyntax = {
  language: "java",
  extension: ".java",
  indentUnit: "    ",
  blockScoped: true,
  emptyBody: null,
  regexImports: ["import java.util.regex.Pattern;"],
  defaultWrapper: {
    open: [
      "public class RecordedTest {",
      "",
      "\t@Test",
      "\tpublic void recordedTest() throws Exception {",
    ],
    close: ["\t}", "}"],
    bodyDepth: 2,
  },
  ops,

  comment: (text) => `// ${text}`,
  string: str,
  statement: (expr) => `${expr};`,
  declareVariable,
  declareLocal: (name, expr, type, declaredAs) =>
    `${declaredAs ?? nativeType(type)} ${name} = ${expr};`,
  reassign: (name, expr) => `${name} = ${expr};`,
  assertTrue: (expr, message) => `assertTrue(${expr}, ${str(message)});`,

  loopBlock(loop, events, condition, ctx) {
    const v = loop.iterationVariable;
    const cond = condition ?? "true";
    const max = loop.maxIterations;
    switch (loop.loopType) {
      case "COUNT":
        return {
          prelude: [],
          segments: [
            {
              open: [`for (int ${v} = 0; ${v} < ${countLimit(loop)}; ${v}++) {`],
              events,
              binds: [[v, "NUMBER"]],
            },
          ],
          close: ["}"],
        };
      case "WHILE":
        return {
          prelude: [ctx.assign(v, "0", "NUMBER")],
          segments: [
            {
              open: [
                max !== undefined
                  ? `while ((${cond}) && ${v} < ${max}) {`
                  : `while (${cond}) {`,
              ],
              events,
              trail: [`${v}++;`],
            },
          ],
          close: ["}"],
        };
      case "UNTIL":
        return {
          prelude: [ctx.assign(v, "0", "NUMBER")],
          segments: [{ open: ["do {"], events, trail: [`${v}++;`] }],
          close: [
            max !== undefined
              ? `} while (!(${cond}) && ${v} < ${max});`
              : `} while (!(${cond}));`,
          ],
        };
      case "FOR_EACH": {
        const id = loop.dataSourceId ?? "";
        let source = ctx.isDeclared(id)
          ? id
          : `loadDataSource(${[id, loop.dataSourcePath]
              .filter((part): part is string => part !== undefined)
              .map(str)
              .join(", ")})`;
        if (max !== undefined) {
          source = `${source}.stream().limit(${max}).toList()`;
        }
        return {
          prelude: [],
          segments: [
            {
              open: [`for (Object ${v} : ${source}) {`],
              events,
              binds: [[v, "OBJECT"]],
            },
          ],
          close: ["}"],
        };
      }
    }
  },

  conditionalBlock(condition, thenEvents, elseEvents) {
    return {
      prelude: [],
      segments: [
        { open: [`if (${condition}) {`], events: thenEvents },
        ...(elseEvents.length > 0
          ? [{ open: ["} else {"], events: elseEvents }]
          : []),
      ],
      close: ["}"],
    };
  },

  tryCatchBlock(event) {
    const e = event.errorVariable;
    const types = event.catchErrorTypes ?? [];
    return {
      prelude: [],
      segments: [
        { open: ["try {"], events: event.tryEvents },
        {
          open: [
            `} catch (${types.length > 0 ? types.join(" | ") : "Exception"} ${e}) {`,
          ],
          lead: event.logError ? [`System.err.println(${e}.getMessage());`] : [],
          events: event.catchEvents,
          trail: event.continueOnError === false ? [`throw ${e};`] : [],
          binds: [[e, "OBJECT"]],
        },
        ...(event.finallyEvents.length > 0
          ? [{ open: ["} finally {"], events: event.finallyEvents }]
          : []),
      ],
      close: ["}"],
    };
  },
};
