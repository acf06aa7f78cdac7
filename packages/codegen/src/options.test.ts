import { describe, it, expect } from "vitest";
import { resolveOptions } from "./options.js";

const defaults = { language: "javascript", framework: "playwright" } as const;

describe("resolveOptions", () => {
  it("uses the defaults for an empty request", () => {
    expect(resolveOptions({}, defaults)).toEqual({
      language: "javascript",
      framework: "playwright",
      includeComments: true,
      includeImports: true,
      prettify: true,
    });
  });

  it("picks the first framework of another language", () => {
    expect(resolveOptions({ language: "python" }, defaults).framework).toBe("selenium");
    expect(resolveOptions({ language: "csharp" }, defaults).framework).toBe("selenium");
  });

  it("keeps explicit values", () => {
    expect(
      resolveOptions(
        { language: "java", framework: "appium", includeComments: false, prettify: false },
        defaults
      )
    ).toEqual({
      language: "java",
      framework: "appium",
      includeComments: false,
      includeImports: true,
      prettify: false,
    });
  });
});
