import { describe, it, expect } from "vitest";
import { redactForLog, redactJson, truncateJson } from "./redact.js";

describe("redactJson", () => {
  it("redacts matching keys at any depth, ignoring case", () => {
    const input = {
      message: "boom",
      headers: { Authorization: "Bearer test-secret" },
      items: [{ password: "test-password", name: "a" }],
    };

    expect(redactJson(input, ["authorization", "password"])).toEqual({
      message: "boom",
      headers: { Authorization: "[REDACTED]" },
      items: [{ password: "[REDACTED]", name: "a" }],
    });
  });

  it("leaves primitives alone", () => {
    expect(redactJson("plain", ["password"])).toBe("plain");
    expect(redactJson(null, ["password"])).toBeNull();
  });
});

describe("truncateJson", () => {
  it("returns short JSON unchanged", () => {
    expect(truncateJson({ a: 1 }, 100)).toBe('{"a":1}');
  });

  it("cuts long JSON to the limit", () => {
    const out = truncateJson({ text: "x".repeat(100) }, 30);
    expect(out).toHaveLength(30);
    expect(out.endsWith("...[TRUNCATED]")).toBe(true);
  });
});

describe("redactForLog", () => {
  it("redacts before truncating", () => {
    expect(redactForLog({ token: "test-token" }, ["token"])).toBe(
      '{"token":"[REDACTED]"}'
    );
  });
});
