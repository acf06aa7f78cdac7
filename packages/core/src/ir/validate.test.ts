/**
 * Tests for event validity rules.
 */

import { describe, it, expect } from "vitest";
import type { AssertionEvent, RecordedEvent } from "../types/index.js";
import {
  isValid,
  validateCaptureConfig,
  validateCondition,
  validateLoopConfig,
  validationErrors,
} from "./validate.js";

const base = { timestamp: 1700000000000, url: "https://shop.test/" };

function assertion(overrides: Partial<AssertionEvent>): AssertionEvent {
  return {
    ...base,
    id: "a1",
    type: "ASSERTION",
    assertionType: "TEXT_EQUALS",
    expectedValue: "ok",
    ...overrides,
  };
}

describe("validationErrors", () => {
  it("accepts a click with a selector", () => {
    expect(
      isValid({
        ...base,
        id: "c1",
        type: "CLICK",
        element: { tagName: "button", cssSelector: "button.primary" },
      })
    ).toBe(true);
  });

  it("rejects a click without any selector", () => {
    expect(
      validationErrors({
        ...base,
        id: "c1",
        type: "CLICK",
        element: { tagName: "button" },
      })
    ).toEqual(["Click target has no selector"]);
  });

  it("accepts a file input with files and no value", () => {
    expect(
      isValid({
        ...base,
        id: "i1",
        type: "INPUT",
        element: { tagName: "input", id: "upload" },
        inputType: "FILE",
        selectedFiles: ["report.pdf"],
      })
    ).toBe(true);
  });

  it("rejects an input with neither value nor files", () => {
    expect(
      validationErrors({
        ...base,
        id: "i1",
        type: "INPUT",
        element: { tagName: "input", id: "q" },
      })
    ).toEqual(["Input needs a value or selected files"]);
  });

  it("rejects navigation with a blank target", () => {
    expect(
      validationErrors({
        ...base,
        id: "n1",
        type: "NAVIGATION",
        targetUrl: "  ",
      })
    ).toEqual(["Target URL is required"]);
  });

  describe("assertions", () => {
    it("requires an element for element assertions", () => {
      expect(validationErrors(assertion({}))).toEqual([
        "TEXT_EQUALS assertion needs a target element",
      ]);
    });

    it("does not require an element for title assertions", () => {
      expect(isValid(assertion({ assertionType: "TITLE" }))).toBe(true);
    });

    it("requires an attribute name for attribute assertions", () => {
      expect(
        validationErrors(
          assertion({
            assertionType: "ATTRIBUTE_EQUALS",
            element: { tagName: "a", id: "home" },
          })
        )
      ).toEqual(["Attribute assertion needs an attribute name"]);
    });

    it("requires a script for custom assertions", () => {
      expect(
        validationErrors(assertion({ assertionType: "CUSTOM_JAVASCRIPT" }))
      ).toEqual(["Custom JavaScript assertion needs a script"]);
    });
  });

  it("collects every custom script problem", () => {
    expect(
      validationErrors({
        ...base,
        id: "j1",
        type: "CUSTOM_JS",
        script: "",
        timeoutMs: 0,
        useElementContext: true,
      })
    ).toEqual([
      "JavaScript code is required",
      "Timeout must be a positive number",
      "Context element is required when using element context",
    ]);
  });

  it("judges containers on their own fields only", () => {
    const group: RecordedEvent = {
      ...base,
      id: "g1",
      type: "GROUP",
      name: "Checkout",
      events: [{ ...base, id: "c1", type: "CLICK" }],
    };
    expect(isValid(group)).toBe(true);
  });

  it("requires a group name", () => {
    expect(
      validationErrors({ ...base, id: "g1", type: "GROUP", name: "", events: [] })
    ).toEqual(["Group name is required"]);
  });

  it("requires a condition on conditionals", () => {
    expect(
      validationErrors({
        ...base,
        id: "if1",
        type: "CONDITIONAL",
        thenEvents: [],
        elseEvents: [],
      })
    ).toEqual(["Condition configuration is required"]);
  });

  it("checks try-catch blocks", () => {
    expect(
      validationErrors({
        ...base,
        id: "t1",
        type: "TRY_CATCH",
        tryEvents: [],
        catchEvents: [],
        finallyEvents: [],
        errorVariable: "",
      })
    ).toEqual([
      "Try block must contain at least one event",
      "Error variable name is required",
    ]);
  });
});

describe("validateLoopConfig", () => {
  it("requires a count for COUNT loops", () => {
    expect(
      validateLoopConfig({ loopType: "COUNT", iterationVariable: "i" })
    ).toEqual(["Count is required for COUNT loop type"]);
  });

  it("rejects a negative count", () => {
    expect(
      validateLoopConfig({ loopType: "COUNT", iterationVariable: "i", count: -1 })
    ).toEqual(["Count must be a positive number"]);
  });

  it("accepts a zero count", () => {
    expect(
      validateLoopConfig({ loopType: "COUNT", iterationVariable: "i", count: 0 })
    ).toEqual([]);
  });

  it("requires a condition for UNTIL loops", () => {
    expect(
      validateLoopConfig({ loopType: "UNTIL", iterationVariable: "i" })
    ).toEqual(["Condition is required for UNTIL loop type"]);
  });

  it("requires a data source and positive limit", () => {
    expect(
      validateLoopConfig({
        loopType: "FOR_EACH",
        iterationVariable: "",
        maxIterations: 0,
      })
    ).toEqual([
      "Data source ID is required for FOR_EACH loop type",
      "Iteration variable name is required",
      "Maximum iterations must be a positive number",
    ]);
  });
});

describe("variable names", () => {
  it("rejects an iteration variable that is not an identifier", () => {
    expect(
      validateLoopConfig({ loopType: "COUNT", iterationVariable: "i; i++", count: 2 })
    ).toEqual(['Iteration variable name "i; i++" is not a valid identifier']);
  });

  it("rejects capture and error variable names that are not identifiers", () => {
    expect(
      validateCaptureConfig({ variableName: "1st", source: "URL", method: "PROPERTY" })
    ).toEqual(['Variable name "1st" is not a valid identifier']);
    expect(
      validationErrors({
        ...base,
        id: "t2",
        type: "TRY_CATCH",
        tryEvents: [{ ...base, id: "n1", type: "NAVIGATION", targetUrl: "https://example.test" }],
        catchEvents: [],
        finallyEvents: [],
        errorVariable: "e) {",
      })
    ).toEqual(['Error variable name "e) {" is not a valid identifier']);
  });

  it("rejects operand variable names that are not identifiers", () => {
    expect(
      validateCondition({
        operator: "EQUALS",
        left: { type: "VARIABLE", variableName: "a-b" },
        right: { type: "LITERAL", value: "1" },
      })
    ).toEqual(['Operand variable name "a-b" is not a valid identifier']);
  });

  it("accepts dollar and underscore names", () => {
    expect(
      validateLoopConfig({ loopType: "COUNT", iterationVariable: "$row_2", count: 1 })
    ).toEqual([]);
  });
});

describe("validateCaptureConfig", () => {
  it("requires a property for element property capture", () => {
    expect(
      validateCaptureConfig({
        variableName: "price",
        source: "ELEMENT",
        method: "PROPERTY",
        selector: ".price",
      })
    ).toEqual(["Property is required for element property capture"]);
  });

  it("requires a target for element capture", () => {
    expect(
      validateCaptureConfig({
        variableName: "price",
        source: "ELEMENT",
        method: "INNER_TEXT",
      })
    ).toEqual([
      "Either target element or selector is required for element capture",
    ]);
  });

  it("requires an expression for JSONPath response capture", () => {
    expect(
      validateCaptureConfig({
        variableName: "",
        source: "RESPONSE",
        method: "JSON_PATH",
      })
    ).toEqual([
      "Variable name is required",
      "Expression is required for response capture",
    ]);
  });

  it("accepts cookie capture", () => {
    expect(
      validateCaptureConfig({
        variableName: "session",
        source: "COOKIE",
        method: "PROPERTY",
        property: "sid",
      })
    ).toEqual([]);
  });
});
