/**
 * Script generator.
 * Walks an event tree depth-first and emits a test script for one
 * language/framework pair. Output depends only on the request.
 */

import {
  IDENTIFIER_PATTERN,
  describeEvent,
  isValid,
  resolveLocator,
  walkEvents,
} from "@testcast/core";
import type {
  GenerationRequest,
  GenerationResult,
  LeafEvent,
  Locator,
  RecordedEvent,
} from "@testcast/core";
import { commandFor } from "./commands.js";
import { conditionExpression } from "./conditions.js";
import type { FrameworkProfile, RenderContext } from "./context.js";
import { findProfile, scaffoldProfile } from "./frameworks/index.js";
import { languageSyntax } from "./languages/index.js";
import type { BlockShape } from "./languages/types.js";
import { VariableScope } from "./scope.js";
import { numericLiteral } from "./variables.js";
import { CodeWriter, prettify } from "./writer.js";

const VARIABLE_REF = /^\$\{([A-Za-z_$][\w$]*)\}$/;

/** True when any rendered step needs regular expressions */
export function usesRegex(steps: RecordedEvent[]): boolean {
  let found = false;
  walkEvents(steps, (event) => {
    if (event.disabled) {
      return false;
    }
    switch (event.type) {
      case "ASSERTION":
        found ||= event.assertionType === "REGEX_MATCH";
        break;
      case "CAPTURE":
        found ||=
          event.capture.source === "URL" &&
          event.capture.method === "REGEX" &&
          Boolean(event.capture.expression);
        break;
      case "CONDITIONAL":
        found ||= event.condition?.operator === "MATCHES" && !event.condition.expression;
        break;
      case "LOOP":
        found ||=
          event.loop.condition?.operator === "MATCHES" && !event.loop.condition.expression;
        break;
    }
    return undefined;
  });
  return found;
}

function resolveProfile(request: GenerationRequest): FrameworkProfile {
  const { language, framework } = request.options;
  return findProfile(language, framework) ?? scaffoldProfile(language, framework);
}

function renderLeaf(event: LeafEvent, command: string, ctx: RenderContext): string[] | null {
  const table = ctx.profile.renderers;
  switch (event.type) {
    case "CLICK": {
      const render = table.CLICK?.[command];
      return render ? render(event, ctx) : null;
    }
    case "INPUT": {
      const render = table.INPUT?.[command];
      return render ? render(event, ctx) : null;
    }
    case "NAVIGATION": {
      const render = table.NAVIGATION?.[command];
      return render ? render(event, ctx) : null;
    }
    case "ASSERTION": {
      const render = table.ASSERTION?.[command];
      return render ? render(event, ctx) : null;
    }
    case "CAPTURE": {
      const render = table.CAPTURE?.[command];
      return render ? render(event, ctx) : null;
    }
    case "CUSTOM_JS": {
      const render = table.CUSTOM_JS?.[command];
      return render ? render(event, ctx) : null;
    }
  }
}

/**
 * Generate a test script from recorded steps.
 */
export function generateCode(request: GenerationRequest): GenerationResult {
  const { options, steps, variables } = request;
  const syntax = languageSyntax(options.language);
  const profile = resolveProfile(request);
  const writer = new CodeWriter(syntax.indentUnit, syntax.comment);
  const scope = new VariableScope();
  const { ops } = syntax;

  const variableRef = (raw: string | null | undefined): string | null => {
    const match = raw ? VARIABLE_REF.exec(raw) : null;
    const name = match?.[1];
    return name !== undefined && scope.lookup(name) !== undefined ? name : null;
  };

  const ctx: RenderContext = {
    syntax,
    profile,
    options,
    str: syntax.string,
    isDeclared: (name) => scope.lookup(name) !== undefined,
    assign(name, expr, type, declaredAs) {
      if (scope.lookup(name) !== undefined) {
        return syntax.reassign(name, expr);
      }
      scope.declare(name, type);
      return syntax.declareLocal(name, expr, type, declaredAs);
    },
    target(element) {
      const locator = resolveLocator(element);
      return locator ? { expr: profile.locate(locator), locator } : null;
    },
    targetFromSelector(selector) {
      const locator: Locator = resolveLocator({ tagName: "", selector }) ?? {
        strategy: "CSS",
        value: selector,
      };
      return { expr: profile.locate(locator), locator };
    },
    variableRef,
    value(raw) {
      const name = variableRef(raw);
      if (name !== null) {
        return scope.lookup(name) === "STRING" ? name : ops.toString(name);
      }
      return syntax.string(raw ?? "");
    },
    numberValue(raw) {
      const name = variableRef(raw);
      if (name !== null) {
        return scope.lookup(name) === "NUMBER" ? name : ops.toNumber(name);
      }
      const text = raw ?? "";
      return numericLiteral(text) ?? ops.toNumber(syntax.string(text));
    },
  };

  function emitLeaf(event: LeafEvent): void {
    const command = commandFor(event);
    const lines = renderLeaf(event, command, ctx);
    if (lines === null) {
      writer.comment(
        `Unsupported: ${event.type} '${command}' for ${options.language}/${profile.framework}`
      );
      return;
    }
    for (const line of lines) {
      writer.statement(line);
    }
  }

  function emitShape(shape: BlockShape, number: string): void {
    for (const line of shape.prelude) {
      writer.statement(line);
    }
    let child = 0;
    for (const segment of shape.segments) {
      for (const line of segment.open) {
        writer.structural(line);
      }
      writer.indent();
      if (syntax.blockScoped) {
        scope.push();
      }
      for (const [name, type] of segment.binds ?? []) {
        scope.declare(name, type);
      }
      const before = writer.statementCount;
      for (const line of segment.lead ?? []) {
        writer.statement(line);
      }
      child = emitList(segment.events, number, child);
      for (const line of segment.trail ?? []) {
        writer.statement(line);
      }
      if (writer.statementCount === before && syntax.emptyBody) {
        writer.statement(syntax.emptyBody);
      }
      if (syntax.blockScoped) {
        scope.pop();
      }
      writer.dedent();
    }
    for (const line of shape.close) {
      writer.structural(line);
    }
  }

  function emitEvent(event: RecordedEvent, number: string): void {
    const description = describeEvent(event);
    if (event.disabled) {
      writer.comment(`DISABLED: ${description}`);
      return;
    }
    if (!isValid(event)) {
      writer.comment(`INVALID: ${description}`);
      return;
    }
    if (options.includeComments) {
      writer.comment(`Step ${number}: ${description}`);
    }

    switch (event.type) {
      case "GROUP":
        emitList(event.events, number, 0);
        if (options.includeComments) {
          writer.comment(`End group: ${event.name}`);
        }
        return;
      case "LOOP": {
        const condition = event.loop.condition
          ? conditionExpression(event.loop.condition, ctx)
          : null;
        emitShape(syntax.loopBlock(event.loop, event.events, condition, ctx), number);
        return;
      }
      case "CONDITIONAL": {
        const condition = event.condition
          ? conditionExpression(event.condition, ctx)
          : ops.bool(false);
        emitShape(
          syntax.conditionalBlock(condition, event.thenEvents, event.elseEvents),
          number
        );
        return;
      }
      case "TRY_CATCH":
        emitShape(syntax.tryCatchBlock(event, ctx), number);
        return;
      default:
        emitLeaf(event);
    }
  }

  /** Emit a list of siblings; numbering continues from `start` */
  function emitList(events: RecordedEvent[], prefix: string, start: number): number {
    let index = start;
    for (const event of events) {
      index += 1;
      if (prefix === "" && index > 1 && options.prettify) {
        writer.blank();
      }
      emitEvent(event, prefix === "" ? String(index) : `${prefix}.${index}`);
    }
    return index;
  }

  if (options.includeImports) {
    const imports = [
      ...profile.imports,
      ...(usesRegex(steps) ? syntax.regexImports : []),
    ];
    if (imports.length > 0) {
      imports.forEach((line) => writer.raw(line));
      writer.blank();
    }
  }

  const wrapper = profile.wrapper ?? syntax.defaultWrapper;
  wrapper.open.forEach((line) => writer.raw(line));
  writer.setDepth(wrapper.bodyDepth);
  const bodyStart = writer.statementCount;

  if (profile.setup.length > 0) {
    profile.setup.forEach((line) => writer.statement(line));
    writer.blank();
  }

  if (variables.length > 0) {
    if (options.includeComments) {
      writer.comment("Declare variables");
    }
    for (const variable of variables) {
      if (!IDENTIFIER_PATTERN.test(variable.name)) {
        writer.comment(`INVALID: variable name ${JSON.stringify(variable.name)}`);
        continue;
      }
      scope.declare(variable.name, variable.type);
      writer.statement(syntax.declareVariable(variable));
    }
    writer.blank();
  }

  if (options.includeComments) {
    writer.comment("Test steps");
  }
  emitList(steps, "", 0);

  if (profile.teardown.length > 0) {
    writer.blank();
    profile.teardown.forEach((line) => writer.statement(line));
  }
  if (writer.statementCount === bodyStart && syntax.emptyBody) {
    writer.statement(syntax.emptyBody);
  }

  writer.setDepth(0);
  wrapper.close.forEach((line) => writer.raw(line));

  const lines = writer.toLines();
  return {
    code: options.prettify ? prettify(lines) : `${lines.join("\n")}\n`,
    fileExtension: syntax.extension,
    language: options.language,
    framework: options.framework,
  };
}
