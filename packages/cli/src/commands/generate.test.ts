import { describe, it, expect } from "vitest";
import { flagOverrides, mergeOptions } from "./generate.js";

describe("flagOverrides", () => {
  it("maps flags onto generation options", () => {
    expect(
      flagOverrides({
        language: "csharp",
        framework: "specflow",
        comments: false,
        imports: true,
        prettify: false,
      })
    ).toEqual({
      language: "csharp",
      framework: "specflow",
      includeComments: false,
      prettify: false,
    });
  });

  it("returns nothing for default flags", () => {
    expect(flagOverrides({ comments: true, imports: true, prettify: true })).toEqual({});
  });

  it("rejects an unknown language", () => {
    expect(flagOverrides({ language: "cobol" })).toBe("Unknown language: cobol");
  });
});

describe("mergeOptions", () => {
  it("lets flags win over the file", () => {
    expect(
      mergeOptions({ language: "python", framework: "pytest", includeComments: true }, { includeComments: false })
    ).toEqual({ language: "python", framework: "pytest", includeComments: false });
  });

  it("drops the file's framework when the language changes", () => {
    expect(
      mergeOptions({ language: "python", framework: "pytest" }, { language: "java" })
    ).toEqual({ language: "java", framework: undefined });
  });

  it("keeps the file's framework for the same language", () => {
    expect(
      mergeOptions({ language: "python", framework: "pytest" }, { language: "python" })
    ).toEqual({ language: "python", framework: "pytest" });
  });
});
