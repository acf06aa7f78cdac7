/**
 * Memoised code generation. Results are keyed by a SHA-256 hash of the
 * request and evicted least-recently-used first.
 */

import { createHash } from "node:crypto";
import { generateCode } from "@testcast/codegen";
import type { GenerationRequest, GenerationResult } from "@testcast/core";

export interface CachedGeneration {
  result: GenerationResult;
  cached: boolean;
}

/**
 * Hash of a request. Requests decoded by the request schema always have
 * the same key order, so equal requests hash equally.
 */
export function requestHash(request: GenerationRequest): string {
  return createHash("sha256").update(JSON.stringify(request)).digest("hex");
}

export class GenerationCache {
  // Map iteration order doubles as recency order
  private readonly entries = new Map<string, GenerationResult>();
  private hitCount = 0;
  private missCount = 0;

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.entries.size;
  }

  stats(): { size: number; capacity: number; hits: number; misses: number } {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hitCount,
      misses: this.missCount,
    };
  }

  generate(request: GenerationRequest): CachedGeneration {
    const key = requestHash(request);
    const hit = this.entries.get(key);
    if (hit) {
      this.hitCount += 1;
      this.entries.delete(key);
      this.entries.set(key, hit);
      return { result: hit, cached: true };
    }

    this.missCount += 1;
    const result = generateCode(request);
    if (this.capacity > 0) {
      this.entries.set(key, result);
      while (this.entries.size > this.capacity) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
    return { result, cached: false };
  }

  clear(): void {
    this.entries.clear();
  }
}
