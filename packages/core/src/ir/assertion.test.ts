/**
 * Tests for assertion evaluation.
 */

import { describe, it, expect } from "vitest";
import type { AssertionEvent } from "../types/index.js";
import { applyAssertionResult, evaluateAssertion } from "./assertion.js";

function assertion(overrides: Partial<AssertionEvent>): AssertionEvent {
  return {
    id: "a1",
    type: "ASSERTION",
    timestamp: 1700000000000,
    url: "https://shop.test/",
    assertionType: "EQUALS",
    element: { tagName: "span", id: "total" },
    expectedValue: "Done",
    ...overrides,
  };
}

describe("evaluateAssertion", () => {
  describe("string comparisons", () => {
    it("ignores case by default", () => {
      expect(evaluateAssertion(assertion({}), "done")).toEqual({
        passed: true,
        status: "PASSED",
      });
    });

    it("honours caseSensitive", () => {
      expect(
        evaluateAssertion(assertion({ caseSensitive: true }), "done").status
      ).toBe("FAILED");
    });

    it("checks contains, starts with and ends with", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "CONTAINS", expectedValue: "CART" }),
          "/shop/cart/items"
        ).passed
      ).toBe(true);
      expect(
        evaluateAssertion(
          assertion({ assertionType: "STARTS_WITH", expectedValue: "/shop" }),
          "/shop/cart"
        ).passed
      ).toBe(true);
      expect(
        evaluateAssertion(
          assertion({ assertionType: "ENDS_WITH", expectedValue: "/shop" }),
          "/shop/cart"
        ).passed
      ).toBe(false);
    });
  });

  describe("regular expressions", () => {
    it("requires a full match", () => {
      const regex = assertion({
        assertionType: "REGEX_MATCH",
        expectedValue: "\\d{3}",
      });
      expect(evaluateAssertion(regex, "123").passed).toBe(true);
      expect(evaluateAssertion(regex, "1234").passed).toBe(false);
    });

    it("reports an invalid pattern as an error", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "REGEX_MATCH", expectedValue: "(" }),
          "x"
        )
      ).toEqual({ passed: false, status: "ERROR" });
    });
  });

  describe("numeric comparisons", () => {
    it("compares parsed numbers", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "GREATER_THAN", expectedValue: "10" }),
          "12.5"
        ).passed
      ).toBe(true);
      expect(
        evaluateAssertion(
          assertion({ assertionType: "LESS_THAN_OR_EQUALS", expectedValue: "3" }),
          3
        ).passed
      ).toBe(true);
    });

    it("returns ERROR for non-numeric input", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "GREATER_THAN", expectedValue: "10" }),
          "lots"
        ).status
      ).toBe("ERROR");
    });

    it("does not let negation turn an error into a pass", () => {
      expect(
        evaluateAssertion(
          assertion({
            assertionType: "LESS_THAN",
            expectedValue: "10",
            negated: true,
          }),
          "n/a"
        )
      ).toEqual({ passed: false, status: "ERROR" });
    });

    it("applies a tolerance to EQUALS", () => {
      const approx = assertion({ expectedValue: "9.99", tolerance: 0.01 });
      expect(evaluateAssertion(approx, "10").passed).toBe(true);
      expect(evaluateAssertion(approx, "10.5").passed).toBe(false);
    });

    it("compares numerically when asked without a tolerance", () => {
      expect(
        evaluateAssertion(assertion({ expectedValue: "10", numeric: true }), "10.0")
          .passed
      ).toBe(true);
    });

    it("compares counts", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "COUNT_EQUALS", expectedValue: "4" }),
          4
        ).passed
      ).toBe(true);
    });
  });

  describe("absent values", () => {
    it("passes when both sides are absent", () => {
      expect(
        evaluateAssertion(assertion({ expectedValue: null }), undefined).status
      ).toBe("PASSED");
    });

    it("fails when only one side is absent", () => {
      expect(evaluateAssertion(assertion({}), null).status).toBe("FAILED");
      expect(
        evaluateAssertion(assertion({ expectedValue: undefined }), "x").status
      ).toBe("FAILED");
    });
  });

  describe("state assertions", () => {
    it("uses the truthiness of the observed value", () => {
      const visible = assertion({ assertionType: "VISIBLE", expectedValue: null });
      expect(evaluateAssertion(visible, true).passed).toBe(true);
      expect(evaluateAssertion(visible, "false").passed).toBe(false);
      expect(evaluateAssertion(visible, null).passed).toBe(false);
    });

    it("applies negation last", () => {
      expect(
        evaluateAssertion(
          assertion({ assertionType: "PRESENT", negated: true }),
          false
        )
      ).toEqual({ passed: true, status: "PASSED" });
    });
  });

  it("is stable for identical input", () => {
    const contains = assertion({ assertionType: "TEXT_CONTAINS", expectedValue: "ok" });
    expect(evaluateAssertion(contains, "all ok")).toEqual(
      evaluateAssertion(contains, "all ok")
    );
  });
});

describe("applyAssertionResult", () => {
  it("returns a copy with status and actual value", () => {
    const original = assertion({});
    const updated = applyAssertionResult(original, "Pending");

    expect(updated.status).toBe("FAILED");
    expect(updated.actualValue).toBe("Pending");
    expect(original.status).toBeUndefined();
  });

  it("stores numbers as text and absent values as null", () => {
    expect(
      applyAssertionResult(
        assertion({ assertionType: "COUNT_EQUALS", expectedValue: "2" }),
        2
      ).actualValue
    ).toBe("2");
    expect(applyAssertionResult(assertion({}), undefined).actualValue).toBeNull();
  });
});
