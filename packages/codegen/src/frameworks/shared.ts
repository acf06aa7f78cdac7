import type { ElementInfo } from "@testcast/core";
import type { RenderContext, Target } from "../context.js";

/** Render lines for an element, or null when it cannot be located */
export function withTarget(
  element: ElementInfo | undefined,
  ctx: RenderContext,
  render: (target: Target) => string[]
): string[] | null {
  const target = ctx.target(element);
  return target ? render(target) : null;
}

/** String literal; valid in every supported language */
export const str = (value: string): string => JSON.stringify(value);

/** CSS selector matching an element by its accessible label */
export function ariaSelector(label: string): string {
  return `[aria-label=${JSON.stringify(label)}]`;
}

/** Result binding for a custom script: first return variable, if any */
export function bindScriptResult(
  call: string,
  returnVariables: string[] | undefined,
  ctx: RenderContext,
  declaredAs?: string
): string {
  const name = returnVariables?.[0];
  return name
    ? ctx.assign(name, call, "OBJECT", declaredAs)
    : ctx.syntax.statement(call);
}

export const MODIFIER_KEYS = [
  ["ctrlKey", "Control"],
  ["shiftKey", "Shift"],
  ["altKey", "Alt"],
  ["metaKey", "Meta"],
] as const;
