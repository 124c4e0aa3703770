import { EmbeddingProvider } from "../ai/embeddings.client";

/**
 * Content-addressed embedding cache. Keys are the whitespace-normalized input,
 * so an entry can never be stale. Concurrent lookups of the same text share a
 * single provider call; failed lookups are evicted.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  private readonly entries = new Map<string, Promise<number[]>>();

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly maxEntries: number,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * `signal` reaches the provider only for the lookup that starts the request;
   * an aborted request rejects and is evicted like any other failure.
   */
  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (this.maxEntries <= 0) {
      return this.provider.embed(text, signal);
    }

    const key = normalizeCacheKey(text);
    const cached = this.entries.get(key);
    if (cached) {
      // Re-insert to mark as most recently used.
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    const pending = this.provider.embed(text, signal).catch((error: unknown) => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
      throw error;
    });
    this.entries.set(key, pending);
    this.evictOverflow();
    return pending;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}

export function normalizeCacheKey(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
