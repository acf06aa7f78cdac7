import type { Variable } from "@testcast/core";
import {
  booleanValue,
  countLimit,
  numberText,
  parseArrayValue,
  parseObjectValue,
} from "../variables.js";
import type { LanguageSyntax, ValueOps } from "./types.js";

const str = (value: string): string => JSON.stringify(value);

function declareVariable({ name, type, value }: Variable): string {
  switch (type) {
    case "STRING":
      return `let ${name} = ${str(value)};`;
    case "NUMBER":
      return `let ${name} = ${numberText(value)};`;
    case "BOOLEAN":
      return `let ${name} = ${booleanValue(value)};`;
    case "OBJECT":
      return `let ${name} = ${JSON.stringify(parseObjectValue(value))};`;
    case "ARRAY":
      return `let ${name} = ${JSON.stringify(parseArrayValue(value))};`;
  }
}

const ops: ValueOps = {
  toString: (x) => `String(${x})`,
  toNumber: (x) => `Number(${x})`,
  lower: (x) => `${x}.toLowerCase()`,
  equals: (a, b) => `${a} === ${b}`,
  contains: (a, b) => `${a}.includes(${b})`,
  startsWith: (a, b) => `${a}.startsWith(${b})`,
  endsWith: (a, b) => `${a}.endsWith(${b})`,
  fullMatch: (text, pattern, ignoreCase) =>
    `new RegExp("^(?:" + ${pattern} + ")$"${ignoreCase ? ', "i"' : ""}).test(${text})`,
  regexGroup: (text, pattern) => `(${text}.match(new RegExp(${pattern})) ?? [])[1]`,
  compare: (a, op, b) => `${a} ${op === "==" ? "===" : op} ${b}`,
  abs: (x) => `Math.abs(${x})`,
  truthy: (x) => `Boolean(${x})`,
  not: (x) => `!(${x})`,
  withDefault: (x, d) => `(${x} ?? ${d})`,
  nullLiteral: "null",
  bool: (value) => String(value),
};

export const javascriptSyntax: LanguageSyntax = {
  language: "javascript",
  extension: ".js",
  indentUnit: "  ",
  blockScoped: true,
  emptyBody: null,
  regexImports: [],
  defaultWrapper: {
    open: [
      'describe("Recorded test", () => {',
      '\tit("replays the recorded steps", async () => {',
    ],
    close: ["\t});", "});"],
    bodyDepth: 2,
  },
  ops,

  comment: (text) => `// ${text}`,
  string: str,
  statement: (expr) => `${expr};`,
  declareVariable,
  declareLocal: (name, expr) => `let ${name} = ${expr};`,
  reassign: (name, expr) => `${name} = ${expr};`,
  assertTrue: (expr) => `expect(${expr}).toBe(true);`,

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
              open: [`for (let ${v} = 0; ${v} < ${countLimit(loop)}; ${v}++) {`],
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
          source = `${source}.slice(0, ${max})`;
        }
        return {
          prelude: [],
          segments: [
            {
              open: [`for (const ${v} of ${source}) {`],
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
    const lead: string[] = [];
    if (types.length > 0) {
      lead.push(
        `if (![${types.map(str).join(", ")}].includes(${e}.name)) {`,
        `  throw ${e};`,
        "}"
      );
    }
    if (event.logError) {
      lead.push(`console.error(${e});`);
    }
    return {
      prelude: [],
      segments: [
        { open: ["try {"], events: event.tryEvents },
        {
          open: [`} catch (${e}) {`],
          lead,
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
