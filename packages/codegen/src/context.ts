/**
 * Contracts between the generator, framework profiles and renderers.
 */

import type {
  CaptureMethod,
  ElementInfo,
  EventOfKind,
  GenerationOptions,
  Language,
  LeafKind,
  Locator,
  VariableType,
} from "@testcast/core";
import type { BlockContext, LanguageSyntax, Wrapper } from "./languages/types.js";

/** A located element: the framework expression plus the locator behind it */
export interface Target {
  expr: string;
  locator: Locator;
}

export interface RenderContext extends BlockContext {
  syntax: LanguageSyntax;
  profile: FrameworkProfile;
  options: GenerationOptions;

  target(element: ElementInfo | undefined): Target | null;
  targetFromSelector(selector: string): Target;

  /** Text-valued expression for a raw value or `${name}` reference */
  value(raw: string | null | undefined): string;

  /** Numeric expression for a raw value or `${name}` reference */
  numberValue(raw: string | null | undefined): string;

  /** Declared identifier when `raw` is exactly `${name}` */
  variableRef(raw: string | null | undefined): string | null;

  assign(
    name: string,
    expr: string,
    type: VariableType,
    declaredAs?: string
  ): string;
}

/** Renders one leaf event; null means the framework cannot express it */
export type RenderFn<K extends LeafKind> = (
  event: EventOfKind<K>,
  ctx: RenderContext
) => string[] | null;

export type RendererTable = {
  [K in LeafKind]?: Readonly<Record<string, RenderFn<K>>>;
};

/**
 * Read-only page queries. Each returns an expression, or null when the
 * framework has no way to ask.
 */
export interface PageQueries {
  text(target: Target): string | null;
  attribute(target: Target, name: string): string | null;
  property(target: Target, name: string): string | null;
  visible(target: Target): string | null;
  enabled(target: Target): string | null;
  selected(target: Target): string | null;
  count(target: Target): string | null;
  url(): string | null;
  title(): string | null;

  /** Value of a page-side JavaScript expression */
  evaluate(expression: string): string | null;

  cookie(name: string): string | null;
  storage(key: string): string | null;
  response(method: CaptureMethod, expression: string): string | null;
}

/** What an assertion reads, for frameworks that chain assertions */
export type AssertionSubject = "element" | "url" | "title" | "script";

export interface FrameworkProfile {
  language: Language;
  framework: string;
  imports: string[];
  wrapper?: Wrapper;
  setup: string[];
  teardown: string[];

  locate(locator: Locator): string;

  queries?: PageQueries;
  renderers: RendererTable;

  /** Overrides the language's boolean assertion statement */
  assertTrue?(
    expr: string,
    message: string,
    subject: AssertionSubject,
    ctx: RenderContext
  ): string[];
}

/** Queries that answer nothing; profiles override what they support */
export const NO_QUERIES: PageQueries = {
  text: () => null,
  attribute: () => null,
  property: () => null,
  visible: () => null,
  enabled: () => null,
  selected: () => null,
  count: () => null,
  url: () => null,
  title: () => null,
  evaluate: () => null,
  cookie: () => null,
  storage: () => null,
  response: () => null,
};
