import { LRUCache } from "lru-cache";

export interface EmbeddingCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
}

/** LRU cache of embeddings keyed by model and exact input text. */
export class EmbeddingCache {
  private readonly entries: LRUCache<string, number[]> | null;

  private hits = 0;

  private misses = 0;

  constructor({ maxEntries = 1000, ttlMs = 3_600_000 }: EmbeddingCacheOptions = {}) {
    this.entries = maxEntries > 0 ? new LRUCache<string, number[]>({ max: maxEntries, ttl: ttlMs, updateAgeOnGet: true }) : null;
  }

  get(model: string, text: string): number[] | undefined {
    const vector = this.entries?.get(cacheKey(model, text));
    if (vector) {
      this.hits += 1;
    } else {
      this.misses += 1;
    }
    return vector;
  }

  set(model: string, text: string, vector: number[]): void {
    this.entries?.set(cacheKey(model, text), vector);
  }

  stats(): { size: number; hits: number; misses: number } {
    return { size: this.entries?.size ?? 0, hits: this.hits, misses: this.misses };
  }
}

// Embeddings are case-sensitive, so only the model separates otherwise identical text.
function cacheKey(model: string, text: string): string {
  return `${model}\u0000${text}`;
}
