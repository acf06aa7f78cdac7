import { describe, it, expect } from "vitest";
import { parseStepsInput } from "./input.js";

const navigation = {
  id: "n1",
  type: "NAVIGATION",
  timestamp: 1,
  url: "https://shop.test/",
  targetUrl: "https://shop.test/login",
};

describe("parseStepsInput", () => {
  it("reads a generation request with defaults for missing parts", () => {
    const result = parseStepsInput(JSON.stringify({ steps: [navigation] }));

    expect(result).toEqual({
      ok: true,
      input: { steps: [navigation], variables: [], options: {} },
    });
  });

  it("keeps options and variables from the file", () => {
    const result = parseStepsInput(
      JSON.stringify({
        steps: [],
        variables: [{ name: "user", type: "STRING", value: "alice" }],
        options: { language: "python" },
      })
    );

    expect(result).toEqual({
      ok: true,
      input: {
        steps: [],
        variables: [{ name: "user", type: "STRING", value: "alice" }],
        options: { language: "python" },
      },
    });
  });

  it("takes the events of a session", () => {
    const result = parseStepsInput(
      JSON.stringify({ id: "s-1", name: "Login", status: "COMPLETED", events: [navigation] })
    );

    expect(result).toEqual({
      ok: true,
      input: { steps: [navigation], variables: [], options: {} },
    });
  });

  it("lists schema problems", () => {
    const result = parseStepsInput(JSON.stringify({ steps: [], options: { language: "cobol" } }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.startsWith("options.language: ")).toBe(true);
    }
  });

  it("reports unreadable JSON", () => {
    const result = parseStepsInput("{steps");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]?.startsWith("Invalid JSON: ")).toBe(true);
    }
  });

  it("rejects a file with neither steps nor events", () => {
    expect(parseStepsInput("[]")).toEqual({ ok: false, errors: ["Expected object, received array"] });
  });
});
