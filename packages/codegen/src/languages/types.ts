/**
 * Language syntax contracts.
 * A syntax knows how to spell literals, statements, comments and the
 * block structure of containers; it knows nothing about frameworks.
 */

import type {
  Language,
  LoopConfig,
  RecordedEvent,
  TryCatchEvent,
  Variable,
  VariableType,
} from "@testcast/core";

/**
 * Scaffold around the test body. Lines use a leading tab per nesting
 * level; the writer expands tabs to the language's indent unit.
 */
export interface Wrapper {
  open: string[];
  close: string[];
  bodyDepth: number;
}

export type CompareOperator = "==" | ">" | "<" | ">=" | "<=";

/** Expression builders; every argument and result is source text */
export interface ValueOps {
  toString(expr: string): string;
  toNumber(expr: string): string;
  lower(expr: string): string;
  equals(a: string, b: string): string;
  contains(haystack: string, needle: string): string;
  startsWith(text: string, prefix: string): string;
  endsWith(text: string, suffix: string): string;
  fullMatch(text: string, pattern: string, ignoreCase: boolean): string;
  regexGroup(text: string, pattern: string): string;
  compare(a: string, op: CompareOperator, b: string): string;
  abs(expr: string): string;
  truthy(expr: string): string;
  not(expr: string): string;
  withDefault(expr: string, fallback: string): string;
  nullLiteral: string;
  bool(value: boolean): string;
}

export interface BlockSegment {
  /** Lines opening the segment, at the container's depth */
  open: string[];
  events: RecordedEvent[];

  /** Statements before and after the children, one level deeper */
  lead?: string[];
  trail?: string[];

  /** Names introduced inside the segment */
  binds?: ReadonlyArray<readonly [string, VariableType]>;
}

export interface BlockShape {
  prelude: string[];
  segments: BlockSegment[];
  close: string[];
}

/** Scope access for block builders that declare counters */
export interface BlockContext {
  str(value: string): string;
  isDeclared(name: string): boolean;
  assign(name: string, expr: string, type: VariableType): string;
}

export interface LanguageSyntax {
  language: Language;
  extension: string;
  indentUnit: string;

  /** Whether braces open a new variable scope */
  blockScoped: boolean;

  /** Statement for a body that would otherwise be empty */
  emptyBody: string | null;

  /** Imports added when a script uses regular expressions */
  regexImports: string[];

  defaultWrapper: Wrapper;
  ops: ValueOps;

  comment(text: string): string;
  string(value: string): string;
  statement(expr: string): string;
  declareVariable(variable: Variable): string;
  declareLocal(
    name: string,
    expr: string,
    type: VariableType,
    declaredAs?: string
  ): string;
  reassign(name: string, expr: string): string;
  assertTrue(expr: string, message: string): string;

  loopBlock(
    loop: LoopConfig,
    events: RecordedEvent[],
    condition: string | null,
    ctx: BlockContext
  ): BlockShape;
  conditionalBlock(
    condition: string,
    thenEvents: RecordedEvent[],
    elseEvents: RecordedEvent[]
  ): BlockShape;
  tryCatchBlock(event: TryCatchEvent, ctx: BlockContext): BlockShape;
}
