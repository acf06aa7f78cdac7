import { describe, it, expect } from "vitest";
import type { GenerationRequest } from "@testcast/core";
import { GenerationCache, requestHash } from "./codegen-cache.js";

function request(url: string): GenerationRequest {
  return {
    steps: [
      {
        id: "n1",
        type: "NAVIGATION",
        timestamp: 1,
        url,
        targetUrl: url,
      },
    ],
    variables: [],
    options: {
      language: "python",
      framework: "selenium",
      includeComments: false,
      includeImports: false,
      prettify: false,
    },
  };
}

describe("requestHash", () => {
  it("is a stable sha-256 hex digest", () => {
    const hash = requestHash(request("https://a.test/"));
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(requestHash(request("https://a.test/"))).toBe(hash);
    expect(requestHash(request("https://b.test/"))).not.toBe(hash);
  });
});

describe("GenerationCache", () => {
  it("returns the stored result for a repeated request", () => {
    const cache = new GenerationCache(4);
    const first = cache.generate(request("https://a.test/"));
    const second = cache.generate(request("https://a.test/"));

    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.result).toBe(first.result);
    expect(cache.stats()).toEqual({ size: 1, capacity: 4, hits: 1, misses: 1 });
  });

  it("evicts the least recently used entry", () => {
    const cache = new GenerationCache(2);
    cache.generate(request("https://a.test/"));
    cache.generate(request("https://b.test/"));
    cache.generate(request("https://a.test/"));
    cache.generate(request("https://c.test/"));

    expect(cache.size).toBe(2);
    expect(cache.generate(request("https://a.test/")).cached).toBe(true);
    expect(cache.generate(request("https://b.test/")).cached).toBe(false);
  });

  it("stores nothing with a capacity of zero", () => {
    const cache = new GenerationCache(0);
    cache.generate(request("https://a.test/"));
    expect(cache.generate(request("https://a.test/")).cached).toBe(false);
    expect(cache.size).toBe(0);
  });
});
