import type { Variable } from "@testcast/core";
import {
  booleanValue,
  countLimit,
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
    return value.length === 0
      ? "new List<object>()"
      : `new List<object> { ${value.map(literal).join(", ")} }`;
  }
  const entries = Object.entries(value);
  if (entries.length === 0) {
    return "new Dictionary<string, object>()";
  }
  const items = entries.map(([k, v]) => `[${str(k)}] = ${literal(v)}`);
  return `new Dictionary<string, object> { ${items.join(", ")} }`;
}

function declareVariable({ name, type, value }: Variable): string {
  switch (type) {
    case "STRING":
      return `var ${name} = ${str(value)};`;
    case "NUMBER":
      return `var ${name} = ${numberText(value)};`;
    case "BOOLEAN":
      return `var ${name} = ${booleanValue(value)};`;
    case "OBJECT":
      return `var ${name} = ${literal(parseObjectValue(value))};`;
    case "ARRAY":
      return `var ${name} = ${literal(parseArrayValue(value))};`;
  }
}

const ops: ValueOps = {
  toString: (x) => `Convert.ToString(${x})`,
  toNumber: (x) => `Convert.ToDouble(${x})`,
  lower: (x) => `${x}.ToLowerInvariant()`,
  equals: (a, b) => `${a} == ${b}`,
  contains: (a, b) => `${a}.Contains(${b})`,
  startsWith: (a, b) => `${a}.StartsWith(${b})`,
  endsWith: (a, b) => `${a}.EndsWith(${b})`,
  fullMatch: (text, pattern, ignoreCase) =>
    `Regex.IsMatch(${text}, "^(?:" + ${pattern} + ")$"${ignoreCase ? ", RegexOptions.IgnoreCase" : ""})`,
  regexGroup: (text, pattern) => `Regex.Match(${text}, ${pattern}).Groups[1].Value`,
  compare: (a, op, b) => `${a} ${op} ${b}`,
  abs: (x) => `Math.Abs(${x})`,
  truthy: (x) => `Convert.ToBoolean(${x})`,
  not: (x) => `!(${x})`,
  withDefault: (x, d) => `(${x} ?? ${d})`,
  nullLiteral: "null",
  bool: (value) => String(value),
};

export const csharpSyntax: LanguageSyntax = {
  language: "csharp",
  extension: ".cs",
  indentUnit: "    ",
  blockScoped: true,
  emptyBody: null,
  regexImports: ["using System.Text.RegularExpressions;"],
  defaultWrapper: {
    open: [
      "[TestFixture]",
      "public class RecordedTest",
      "{",
      "\t[Test]",
      "\tpublic void RecordedSteps()",
      "\t{",
    ],
    close: ["\t}", "}"],
    bodyDepth: 2,
  },
  ops,

  comment: (text) => `// ${text}`,
  string: str,
  statement: (expr) => `${expr};`,
  declareVariable,
  declareLocal: (name, expr) => `var ${name} = ${expr};`,
  reassign: (name, expr) => `${name} = ${expr};`,
  assertTrue: (expr, message) =>
    `Assert.That(${expr}, Is.True, ${str(message)});`,

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
              open: [`for (var ${v} = 0; ${v} < ${countLimit(loop)}; ${v}++)`, "{"],
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
                  ? `while ((${cond}) && ${v} < ${max})`
                  : `while (${cond})`,
                "{",
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
          segments: [{ open: ["do", "{"], events, trail: [`${v}++;`] }],
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
          : `LoadDataSource(${[id, loop.dataSourcePath]
              .filter((part): part is string => part !== undefined)
              .map(str)
              .join(", ")})`;
        if (max !== undefined) {
          source = `${source}.Take(${max})`;
        }
        return {
          prelude: [],
          segments: [
            {
              open: [`foreach (var ${v} in ${source})`, "{"],
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
        { open: [`if (${condition})`, "{"], events: thenEvents },
        ...(elseEvents.length > 0
          ? [{ open: ["}", "else", "{"], events: elseEvents }]
          : []),
      ],
      close: ["}"],
    };
  },

  tryCatchBlock(event) {
    const e = event.errorVariable;
    const types = event.catchErrorTypes ?? [];
    const filter =
      types.length > 0
        ? ` when (${types.map((type) => `${e} is ${type}`).join(" || ")})`
        : "";
    return {
      prelude: [],
      segments: [
        { open: ["try", "{"], events: event.tryEvents },
        {
          open: ["}", `catch (Exception ${e})${filter}`, "{"],
          lead: event.logError ? [`Console.Error.WriteLine(${e});`] : [],
          events: event.catchEvents,
          trail: event.continueOnError === false ? ["throw;"] : [],
          binds: [[e, "OBJECT"]],
        },
        ...(event.finallyEvents.length > 0
          ? [{ open: ["}", "finally", "{"], events: event.finallyEvents }]
          : []),
      ],
      close: ["}"],
    };
  },
};
