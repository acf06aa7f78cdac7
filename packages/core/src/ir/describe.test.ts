/**
 * Tests for event descriptions.
 */

import { describe, it, expect } from "vitest";
import type {
  AssertionEvent,
  ClickEvent,
  ConditionConfig,
  InputEvent,
  RecordedEvent,
} from "../types/index.js";
import {
  describeCondition,
  describeEvent,
  describeLoop,
  describeCapture,
} from "./describe.js";
import { describeElement, resolveLocator, truncateText } from "./elements.js";

const base = { timestamp: 1700000000000, url: "https://shop.test/" };

function click(overrides: Partial<ClickEvent> = {}): ClickEvent {
  return {
    ...base,
    id: "c1",
    type: "CLICK",
    element: { tagName: "button", id: "save" },
    ...overrides,
  };
}

function input(overrides: Partial<InputEvent> = {}): InputEvent {
  return {
    ...base,
    id: "i1",
    type: "INPUT",
    element: { tagName: "input", cssSelector: "form > input.email" },
    value: "user@example.test",
    ...overrides,
  };
}

function assertion(overrides: Partial<AssertionEvent> = {}): AssertionEvent {
  return {
    ...base,
    id: "a1",
    type: "ASSERTION",
    assertionType: "TEXT_EQUALS",
    element: { tagName: "h1", id: "title" },
    expectedValue: "Welcome",
    ...overrides,
  };
}

describe("truncateText", () => {
  it("keeps short text", () => {
    expect(truncateText("hello", 20)).toBe("hello");
  });

  it("cuts long text to the limit with an ellipsis", () => {
    expect(truncateText("abcdefghijklmnopqrstuvwxyz", 20)).toBe(
      "abcdefghijklmnopq..."
    );
  });
});

describe("describeElement", () => {
  it("prefers the id", () => {
    expect(describeElement({ tagName: "button", id: "go", text: "Go" })).toBe(
      "button with ID 'go'"
    );
  });

  it("falls back to text", () => {
    expect(describeElement({ tagName: "a", text: "Read more" })).toBe(
      "a with text 'Read more'"
    );
  });

  it("falls back to the selector", () => {
    expect(describeElement({ tagName: "div", cssSelector: "div.card" })).toBe(
      "div element div.card"
    );
  });

  it("handles a missing element", () => {
    expect(describeElement(undefined)).toBe("element");
  });
});

describe("resolveLocator", () => {
  it("uses an explicit locator first", () => {
    expect(
      resolveLocator({
        tagName: "button",
        id: "go",
        locator: { strategy: "ACCESSIBILITY_ID", value: "go-button" },
      })
    ).toEqual({ strategy: "ACCESSIBILITY_ID", value: "go-button" });
  });

  it("treats a slash-prefixed selector as XPath", () => {
    expect(resolveLocator({ tagName: "td", selector: "//table//td[2]" })).toEqual(
      { strategy: "XPATH", value: "//table//td[2]" }
    );
  });

  it("falls back to the name attribute", () => {
    expect(resolveLocator({ tagName: "input", name: "q" })).toEqual({
      strategy: "NAME",
      value: "q",
    });
  });
});

describe("describeEvent", () => {
  describe("clicks", () => {
    it("describes a plain click", () => {
      expect(describeEvent(click())).toBe("Click on #save");
    });

    it("includes modifiers and the click type", () => {
      expect(
        describeEvent(click({ doubleClick: true, ctrlKey: true, shiftKey: true }))
      ).toBe("Ctrl+Shift+Double click on #save");
    });

    it("names right clicks", () => {
      expect(describeEvent(click({ button: "RIGHT" }))).toBe(
        "Right click on #save"
      );
    });

    it("uses a placeholder when nothing identifies the target", () => {
      expect(describeEvent(click({ element: { tagName: "span" } }))).toBe(
        "Click on unknown element"
      );
    });
  });

  describe("inputs", () => {
    it("quotes the typed value", () => {
      expect(describeEvent(input())).toBe(
        "Enter 'user@example.test' in form > input.email"
      );
    });

    it("hides masked passwords", () => {
      expect(
        describeEvent(input({ passwordField: true, masked: true, value: "********" }))
      ).toBe("Enter password in form > input.email");
    });

    it("counts uploaded files", () => {
      expect(
        describeEvent(
          input({ inputType: "FILE", selectedFiles: ["a.png", "b.png"] })
        )
      ).toBe("Upload 2 file(s) to form > input.email");
    });
  });

  describe("navigation", () => {
    it("describes back navigation", () => {
      expect(
        describeEvent({
          ...base,
          id: "n1",
          type: "NAVIGATION",
          targetUrl: "https://shop.test/cart",
          back: true,
        })
      ).toBe("Navigate back to https://shop.test/cart");
    });

    it("describes redirects with their source", () => {
      expect(
        describeEvent({
          ...base,
          id: "n2",
          type: "NAVIGATION",
          sourceUrl: "https://shop.test/login",
          targetUrl: "https://shop.test/home",
          redirect: true,
        })
      ).toBe("Redirect from https://shop.test/login to https://shop.test/home");
    });
  });

  describe("assertions", () => {
    it("describes a text assertion", () => {
      expect(describeEvent(assertion())).toBe(
        "Assert that h1 with ID 'title' text equals 'Welcome'"
      );
    });

    it("phrases negation", () => {
      expect(describeEvent(assertion({ negated: true }))).toBe(
        "Assert that h1 with ID 'title' text does not equal 'Welcome'"
      );
    });

    it("appends an executed status", () => {
      expect(
        describeEvent(
          assertion({ assertionType: "VISIBLE", status: "FAILED" })
        )
      ).toBe("Assert that h1 with ID 'title' is visible (FAILED)");
    });

    it("describes page-level assertions without an element", () => {
      expect(
        describeEvent(
          assertion({
            assertionType: "URL_CONTAINS",
            element: undefined,
            expectedValue: "/cart",
          })
        )
      ).toBe("Assert that URL contains '/cart'");
    });
  });

  it("lets an explicit description replace the generated text", () => {
    expect(describeEvent(click({ description: "Save the form" }))).toBe(
      "Save the form"
    );
  });

  it("folds a group description into the group text", () => {
    const group: RecordedEvent = {
      ...base,
      id: "g1",
      type: "GROUP",
      name: "Login",
      description: "fills credentials",
      events: [click(), input()],
    };
    expect(describeEvent(group)).toBe(
      "Group: Login (2 step(s)) - fills credentials"
    );
  });

  it("summarises custom scripts", () => {
    expect(
      describeEvent({
        ...base,
        id: "j1",
        type: "CUSTOM_JS",
        script: "return 1",
        async: true,
        returnVariables: ["total", "count"],
      })
    ).toBe("Execute custom JavaScript, returning total, count (async)");
  });

  it("summarises conditionals", () => {
    expect(
      describeEvent({
        ...base,
        id: "if1",
        type: "CONDITIONAL",
        condition: {
          operator: "EQUALS",
          left: { type: "VARIABLE", variableName: "role" },
          right: { type: "LITERAL", value: "admin" },
        },
        thenEvents: [click()],
        elseEvents: [],
      })
    ).toBe('If ${role} == "admin" then execute 1 step(s)');
  });

  it("summarises try-catch blocks", () => {
    expect(
      describeEvent({
        ...base,
        id: "t1",
        type: "TRY_CATCH",
        tryEvents: [click()],
        catchEvents: [click()],
        finallyEvents: [],
        errorVariable: "e",
        catchErrorTypes: ["TimeoutError"],
      })
    ).toBe(
      "Try-catch block: Try 1 step(s), catch 1 step(s) (catching TimeoutError)"
    );
  });
});

describe("describeCondition", () => {
  it("uses the raw expression when present", () => {
    expect(
      describeCondition({ operator: "EQUALS", expression: "items.length > 0" })
    ).toBe("items.length > 0");
  });

  it("renders NULL for a missing right operand", () => {
    const condition: ConditionConfig = {
      operator: "EQUALS",
      left: { type: "VARIABLE", variableName: "token" },
    };
    expect(describeCondition(condition)).toBe("${token} == NULL");
  });

  it("omits the right operand for unary operators", () => {
    expect(
      describeCondition({
        operator: "IS_TRUE",
        left: { type: "VARIABLE", variableName: "loggedIn" },
        negated: true,
      })
    ).toBe("NOT (${loggedIn} is true)");
  });

  it("reports a condition with nothing to compare", () => {
    expect(describeCondition({ operator: "EQUALS" })).toBe("Invalid condition");
  });

  it("describes element operands", () => {
    expect(
      describeCondition({
        operator: "CONTAINS",
        left: {
          type: "ELEMENT",
          element: { tagName: "span", cssSelector: ".total" },
          property: "textContent",
        },
        right: { type: "LITERAL", value: "$" },
      })
    ).toBe('Element .total.textContent contains "$"');
  });
});

describe("describeLoop", () => {
  it("describes count loops with a limit", () => {
    expect(
      describeLoop({
        loopType: "COUNT",
        iterationVariable: "i",
        count: 3,
        maxIterations: 10,
      })
    ).toBe("Repeat 3 times with i as counter (max 10 iterations)");
  });

  it("describes for-each loops with a path", () => {
    expect(
      describeLoop({
        loopType: "FOR_EACH",
        iterationVariable: "user",
        dataSourceId: "users",
        dataSourcePath: "$.rows",
      })
    ).toBe("For each item in data source users at path $.rows as user");
  });
});

describe("describeCapture", () => {
  it("describes element attribute capture", () => {
    expect(
      describeCapture({
        variableName: "link",
        source: "ELEMENT",
        method: "ATTRIBUTE",
        element: { tagName: "a", id: "next" },
        property: "href",
      })
    ).toBe("Capture element #next attribute 'href' into variable link");
  });

  it("describes JSONPath response capture into a global", () => {
    expect(
      describeCapture({
        variableName: "orderId",
        source: "RESPONSE",
        method: "JSON_PATH",
        expression: "$.order.id",
        global: true,
      })
    ).toBe(
      "Capture response data using JSONPath expression '$.order.id' into variable global.orderId"
    );
  });
});
