import { describe, it, expect } from "vitest";
import type { ConditionConfig, RecordedEvent } from "@testcast/core";
import { generateCode } from "./generator.js";

const base = { timestamp: 1700000000000, url: "https://shop.test/" };

/** The `if` header a javascript/playwright script opens for a condition */
function ifHeader(condition: ConditionConfig): string | undefined {
  const step: RecordedEvent = {
    ...base,
    id: "if1",
    type: "CONDITIONAL",
    condition,
    thenEvents: [],
    elseEvents: [],
  };
  const { code } = generateCode({
    steps: [step],
    variables: [{ name: "total", type: "NUMBER", value: "12" }],
    options: {
      language: "javascript",
      framework: "playwright",
      includeComments: false,
      includeImports: false,
      prettify: false,
    },
  });
  return code
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.startsWith("if ("));
}

describe("conditionExpression", () => {
  it("emits a raw expression verbatim", () => {
    expect(ifHeader({ operator: "EQUALS", expression: "window.ready === true" })).toBe(
      "if (window.ready === true) {"
    );
  });

  it("compares numeric literals without conversion", () => {
    expect(
      ifHeader({
        operator: "GREATER_THAN_OR_EQUALS",
        left: { type: "VARIABLE", variableName: "total" },
        right: { type: "LITERAL", value: "10" },
      })
    ).toBe("if (Number(total) >= 10) {");
  });

  it("drops leading zeros from numeric literals", () => {
    expect(
      ifHeader({
        operator: "GREATER_THAN",
        left: { type: "VARIABLE", variableName: "total" },
        right: { type: "LITERAL", value: "08" },
      })
    ).toBe("if (Number(total) > 8) {");
    expect(
      ifHeader({
        operator: "EQUALS",
        left: { type: "LITERAL", value: "010" },
        right: { type: "VARIABLE", variableName: "total" },
      })
    ).not.toContain("010");
  });

  it("compares text operands as strings", () => {
    expect(
      ifHeader({
        operator: "NOT_EQUALS",
        left: { type: "ELEMENT", element: { tagName: "span", id: "status" } },
        right: { type: "LITERAL", value: "done" },
      })
    ).toBe('if (!(String((await page.locator("#status").innerText())) === "done")) {');
  });

  it("renders boolean literals and negation", () => {
    expect(
      ifHeader({
        operator: "IS_TRUE",
        left: { type: "LITERAL", value: "true" },
        negated: true,
      })
    ).toBe("if (!(Boolean(true))) {");
  });

  it("falls back to the null literal for elements without a locator", () => {
    expect(
      ifHeader({
        operator: "IS_FALSE",
        left: { type: "ELEMENT", element: { tagName: "div" } },
      })
    ).toBe("if (!(Boolean(null))) {");
  });
});
