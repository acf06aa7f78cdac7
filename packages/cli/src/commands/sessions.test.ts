import { describe, it, expect } from "vitest";
import { parseStatus } from "./sessions.js";

describe("parseStatus", () => {
  it("accepts any casing", () => {
    expect(parseStatus("paused")).toBe("PAUSED");
    expect(parseStatus("Completed")).toBe("COMPLETED");
  });

  it("rejects unknown names", () => {
    expect(parseStatus("cancelled")).toBeUndefined();
  });
});
