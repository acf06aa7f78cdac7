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
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "string") return str(value);
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) {
    return `[${value.map(literal).join(", ")}]`;
  }
  const items = Object.entries(value).map(([k, v]) => `${str(k)}: ${literal(v)}`);
  return `{${items.join(", ")}}`;
}

function declareVariable({ name, type, value }: Variable): string {
  switch (type) {
    case "STRING":
      return `${name} = ${str(value)}`;
    case "NUMBER":
      return `${name} = ${numberText(value)}`;
    case "BOOLEAN":
      return `${name} = ${literal(booleanValue(value))}`;
    case "OBJECT":
      return `${name} = ${literal(parseObjectValue(value))}`;
    case "ARRAY":
      return `${name} = ${literal(parseArrayValue(value))}`;
  }
}

const ops: ValueOps = {
  toString: (x) => `str(${x})`,
  toNumber: (x) => `float(${x})`,
  lower: (x) => `${x}.lower()`,
  equals: (a, b) => `${a} == ${b}`,
  contains: (a, b) => `${b} in ${a}`,
  startsWith: (a, b) => `${a}.startswith(${b})`,
  endsWith: (a, b) => `${a}.endswith(${b})`,
  fullMatch: (text, pattern, ignoreCase) =>
    `re.fullmatch(${pattern}, ${text}${ignoreCase ? ", re.IGNORECASE" : ""}) is not None`,
  regexGroup: (text, pattern) => `re.search(${pattern}, ${text}).group(1)`,
  compare: (a, op, b) => `${a} ${op} ${b}`,
  abs: (x) => `abs(${x})`,
  truthy: (x) => `bool(${x})`,
  not: (x) => `not (${x})`,
  withDefault: (x, d) => `(${x} or ${d})`,
  nullLiteral: "None",
  bool: (value) => (value ? "True" : "False"),
};

function dataSource(id: string, path: string | undefined): string {
  const args = [id, path].filter((part): part is string => part !== undefined);
  return `load_data_source(${args.map(str).join(", ")})`;
}

export const pythonSyntax: LanguageSyntax = {
  language: "python",
  extension: ".py",
  indentUnit: "    ",
  blockScoped: false,
  emptyBody: "pass",
  regexImports: ["import re"],
  defaultWrapper: {
    open: ["def test_recorded():"],
    close: [],
    bodyDepth: 1,
  },
  ops,

  comment: (text) => `# ${text}`,
  string: str,
  statement: (expr) => expr,
  declareVariable,
  declareLocal: (name, expr) => `${name} = ${expr}`,
  reassign: (name, expr) => `${name} = ${expr}`,
  assertTrue: (expr, message) => `assert ${expr}, ${str(message)}`,

  loopBlock(loop, events, condition, ctx) {
    const v = loop.iterationVariable;
    const cond = condition ?? "True";
    const max = loop.maxIterations;
    switch (loop.loopType) {
      case "COUNT":
        return {
          prelude: [],
          segments: [
            {
              open: [`for ${v} in range(${countLimit(loop)}):`],
              events,
              binds: [[v, "NUMBER"]],
            },
          ],
          close: [],
        };
      case "WHILE":
        return {
          prelude: [ctx.assign(v, "0", "NUMBER")],
          segments: [
            {
              open: [
                max !== undefined
                  ? `while (${cond}) and ${v} < ${max}:`
                  : `while ${cond}:`,
              ],
              events,
              trail: [`${v} += 1`],
            },
          ],
          close: [],
        };
      case "UNTIL":
        return {
          prelude: [ctx.assign(v, "0", "NUMBER")],
          segments: [
            {
              open: ["while True:"],
              events,
              trail: [
                `${v} += 1`,
                max !== undefined
                  ? `if (${cond}) or ${v} >= ${max}:`
                  : `if ${cond}:`,
                "    break",
              ],
            },
          ],
          close: [],
        };
      case "FOR_EACH": {
        const id = loop.dataSourceId ?? "";
        let source = ctx.isDeclared(id) ? id : dataSource(id, loop.dataSourcePath);
        if (max !== undefined) {
          source = `${source}[:${max}]`;
        }
        return {
          prelude: [],
          segments: [
            { open: [`for ${v} in ${source}:`], events, binds: [[v, "OBJECT"]] },
          ],
          close: [],
        };
      }
    }
  },

  conditionalBlock(condition, thenEvents, elseEvents) {
    return {
      prelude: [],
      segments: [
        { open: [`if ${condition}:`], events: thenEvents },
        ...(elseEvents.length > 0 ? [{ open: ["else:"], events: elseEvents }] : []),
      ],
      close: [],
    };
  },

  tryCatchBlock(event) {
    const e = event.errorVariable;
    const types = event.catchErrorTypes ?? [];
    let clause = `except Exception as ${e}:`;
    if (types.length === 1) {
      clause = `except ${types[0]} as ${e}:`;
    } else if (types.length > 1) {
      clause = `except (${types.join(", ")}) as ${e}:`;
    }
    return {
      prelude: [],
      segments: [
        { open: ["try:"], events: event.tryEvents },
        {
          open: [clause],
          lead: event.logError ? [`print(${e})`] : [],
          events: event.catchEvents,
          trail: event.continueOnError === false ? ["raise"] : [],
          binds: [[e, "OBJECT"]],
        },
        ...(event.finallyEvents.length > 0
          ? [{ open: ["finally:"], events: event.finallyEvents }]
          : []),
      ],
      close: [],
    };
  },
};
