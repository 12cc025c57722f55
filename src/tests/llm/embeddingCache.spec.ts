import { describe, expect, it } from "vitest";
import { EmbeddingCache } from "../../llm/embeddingCache";
import { delay } from "../fakes";

describe("EmbeddingCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new EmbeddingCache({ maxEntries: 2 });
    cache.set("m", "alpha", [1]);
    cache.set("m", "beta", [2]);
    cache.get("m", "alpha");
    cache.set("m", "gamma", [3]);

    expect(cache.get("m", "beta")).toBeUndefined();
    expect(cache.get("m", "alpha")).toEqual([1]);
    expect(cache.get("m", "gamma")).toEqual([3]);
  });

  it("expires entries after the time to live", async () => {
    const cache = new EmbeddingCache({ ttlMs: 30 });
    cache.set("m", "alpha", [1]);
    expect(cache.get("m", "alpha")).toEqual([1]);

    await delay(80);
    expect(cache.get("m", "alpha")).toBeUndefined();
  });

  it("keys by model and exact text", () => {
    const cache = new EmbeddingCache();
    cache.set("small", "Apple", [1, 2]);

    expect(cache.get("small", "Apple")).toEqual([1, 2]);
    expect(cache.get("small", "apple")).toBeUndefined();
    expect(cache.get("large", "Apple")).toBeUndefined();
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 2 });
  });

  it("stores nothing when disabled", () => {
    const cache = new EmbeddingCache({ maxEntries: 0 });
    cache.set("m", "alpha", [1]);
    expect(cache.get("m", "alpha")).toBeUndefined();
    expect(cache.stats().size).toBe(0);
  });
});
