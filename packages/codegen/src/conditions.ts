import type { ConditionConfig, Operand } from "@testcast/core";
import type { RenderContext } from "./context.js";
import type { CompareOperator } from "./languages/types.js";
import { numericLiteral } from "./variables.js";

const COMPARISONS: Partial<Record<ConditionConfig["operator"], CompareOperator>> = {
  GREATER_THAN: ">",
  LESS_THAN: "<",
  GREATER_THAN_OR_EQUALS: ">=",
  LESS_THAN_OR_EQUALS: "<=",
};

function operandExpr(operand: Operand | undefined, ctx: RenderContext): string {
  const { ops } = ctx.syntax;
  if (!operand) {
    return ops.nullLiteral;
  }
  switch (operand.type) {
    case "LITERAL": {
      const value = operand.value.trim();
      const number = numericLiteral(value);
      if (number !== null) return number;
      if (value === "true" || value === "false") return ops.bool(value === "true");
      return ctx.str(operand.value);
    }
    case "VARIABLE":
      return operand.variableName;
    case "ELEMENT": {
      const target = ctx.target(operand.element);
      const queries = ctx.profile.queries;
      if (!target || !queries) {
        return ops.nullLiteral;
      }
      const expr = operand.property
        ? queries.property(target, operand.property)
        : queries.text(target);
      return expr ?? ops.nullLiteral;
    }
  }
}

function textOf(operand: Operand | undefined, ctx: RenderContext): string {
  if (operand?.type === "LITERAL") {
    return ctx.str(operand.value);
  }
  return ctx.syntax.ops.toString(operandExpr(operand, ctx));
}

function numberOf(operand: Operand | undefined, ctx: RenderContext): string {
  const number = operand?.type === "LITERAL" ? numericLiteral(operand.value) : null;
  if (number !== null) {
    return number;
  }
  return ctx.syntax.ops.toNumber(operandExpr(operand, ctx));
}

function baseExpression(condition: ConditionConfig, ctx: RenderContext): string {
  const { ops } = ctx.syntax;
  const { left, right, operator } = condition;

  const comparison = COMPARISONS[operator];
  if (comparison) {
    return ops.compare(numberOf(left, ctx), comparison, numberOf(right, ctx));
  }

  switch (operator) {
    case "EQUALS":
      return ops.equals(textOf(left, ctx), textOf(right, ctx));
    case "NOT_EQUALS":
      return ops.not(ops.equals(textOf(left, ctx), textOf(right, ctx)));
    case "CONTAINS":
      return ops.contains(textOf(left, ctx), textOf(right, ctx));
    case "NOT_CONTAINS":
      return ops.not(ops.contains(textOf(left, ctx), textOf(right, ctx)));
    case "STARTS_WITH":
      return ops.startsWith(textOf(left, ctx), textOf(right, ctx));
    case "ENDS_WITH":
      return ops.endsWith(textOf(left, ctx), textOf(right, ctx));
    case "MATCHES":
      return ops.fullMatch(textOf(left, ctx), textOf(right, ctx), false);
    case "IS_TRUE":
      return ops.truthy(operandExpr(left, ctx));
    case "IS_FALSE":
      return ops.not(ops.truthy(operandExpr(left, ctx)));
    default:
      return ops.bool(false);
  }
}

/**
 * Boolean expression for a condition in the target language.
 * A raw expression is emitted verbatim.
 */
export function conditionExpression(
  condition: ConditionConfig,
  ctx: RenderContext
): string {
  const expr =
    condition.expression !== undefined && condition.expression.trim().length > 0
      ? condition.expression
      : baseExpression(condition, ctx);
  return condition.negated ? ctx.syntax.ops.not(expr) : expr;
}
