/**
 * Tests for wire envelope encoding and decoding.
 */

import { describe, it, expect } from "vitest";
import type { RecordedEvent } from "../types/index.js";
import {
  decodeEnvelope,
  decodeEventEnvelope,
  decodeInboundMessage,
  encodeEventEnvelope,
} from "./envelope.js";
import { generationRequestSchema, recordedEventSchema, variableSchema } from "./schemas.js";

const base = { timestamp: 1700000000000, url: "https://shop.test/" };

const tree: RecordedEvent = {
  ...base,
  id: "loop-1",
  type: "LOOP",
  loop: {
    loopType: "WHILE",
    iterationVariable: "i",
    maxIterations: 5,
    condition: {
      operator: "LESS_THAN",
      left: { type: "VARIABLE", variableName: "i" },
      right: { type: "LITERAL", value: "3" },
    },
  },
  events: [
    {
      ...base,
      id: "cond-1",
      type: "CONDITIONAL",
      condition: { operator: "IS_TRUE", expression: "window.ready" },
      thenEvents: [
        {
          ...base,
          id: "click-1",
          type: "CLICK",
          element: {
            tagName: "button",
            cssSelector: "button.next",
            attributes: { "data-test": "next" },
            locator: { strategy: "CSS", value: "button.next" },
          },
          button: "LEFT",
        },
      ],
      elseEvents: [
        {
          ...base,
          id: "assert-1",
          type: "ASSERTION",
          assertionType: "TEXT_CONTAINS",
          element: { tagName: "p", id: "msg" },
          expectedValue: null,
          actualValue: null,
          status: "NOT_EXECUTED",
        },
      ],
    },
  ],
};

describe("event envelopes", () => {
  it("round-trips an event tree through JSON", () => {
    const wire = JSON.stringify(encodeEventEnvelope("s-1", tree, 1700000000500));
    const decoded = decodeEventEnvelope(wire);

    expect(decoded).toEqual({
      ok: true,
      value: {
        type: "LOOP",
        sessionId: "s-1",
        timestamp: 1700000000500,
        payload: tree,
      },
    });
  });

  it("rejects a payload whose type differs from the envelope", () => {
    const decoded = decodeEventEnvelope({
      type: "INPUT",
      sessionId: "s-1",
      timestamp: 1,
      payload: { ...base, id: "c1", type: "CLICK" },
    });

    expect(decoded).toEqual({
      ok: false,
      errors: ["Envelope type INPUT does not match payload type CLICK"],
    });
  });

  it("rejects control types as events", () => {
    const decoded = decodeEventEnvelope({
      type: "HEARTBEAT",
      sessionId: "s-1",
      timestamp: 1,
      payload: {},
    });
    expect(decoded).toEqual({ ok: false, errors: ["Not an event type: HEARTBEAT"] });
  });

  it("reports malformed JSON", () => {
    const decoded = decodeEnvelope("{not json");
    expect(decoded.ok).toBe(false);
  });

  it("reports missing envelope fields by path", () => {
    const decoded = decodeEnvelope({ type: "CLICK", timestamp: 1, payload: {} });
    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.errors[0]).toMatch(/^sessionId: /);
    }
  });
});

describe("recordedEventSchema", () => {
  it("maps an unknown locator strategy to XPATH", () => {
    const parsed = recordedEventSchema.parse({
      ...base,
      id: "c1",
      type: "CLICK",
      element: {
        tagName: "a",
        locator: { strategy: "SHADOW_DOM", value: "//a[1]" },
      },
    });

    expect(parsed.type === "CLICK" && parsed.element?.locator).toEqual({
      strategy: "XPATH",
      value: "//a[1]",
    });
  });

  it("rejects an unknown event kind", () => {
    expect(
      recordedEventSchema.safeParse({ ...base, id: "x", type: "HOVER" }).success
    ).toBe(false);
  });
});

describe("decodeInboundMessage", () => {
  it("decodes commands", () => {
    expect(decodeInboundMessage('{"type":"COMMAND","action":"PAUSE"}')).toEqual({
      ok: true,
      value: { type: "COMMAND", action: "PAUSE" },
    });
  });

  it("rejects unknown actions", () => {
    expect(
      decodeInboundMessage({ type: "COMMAND", action: "REBOOT" }).ok
    ).toBe(false);
  });
});

describe("generationRequestSchema", () => {
  it("requires complete options", () => {
    const result = generationRequestSchema.safeParse({
      steps: [],
      variables: [],
      options: { language: "python", framework: "pytest" },
    });
    expect(result.success).toBe(false);
  });
});

describe("variableSchema", () => {
  it("accepts identifier names only", () => {
    expect(variableSchema.safeParse({ name: "user_1", type: "STRING", value: "a" }).success).toBe(
      true
    );
    expect(
      variableSchema.safeParse({ name: "user; x", type: "STRING", value: "a" }).success
    ).toBe(false);
    expect(variableSchema.safeParse({ name: "", type: "STRING", value: "a" }).success).toBe(false);
  });
});
