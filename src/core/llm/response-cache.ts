/**
 * Prompt-keyed response cache for the model gateway
 *
 * Lives as long as the gateway that owns it (normally the process). The key is
 * the exact prompt text only: a prompt answered at one temperature is served
 * from cache when asked again at another. Entries are immutable once written.
 * Bounded by LRU eviction using Map insertion order.
 */

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  maxEntries: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, string>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(maxEntries: number) {
    if (maxEntries < 1) {
      throw new Error('Response cache maxEntries must be at least 1');
    }
    this.maxEntries = maxEntries;
  }

  /**
   * Look up a prompt and mark it as recently used
   */
  get(prompt: string): string | undefined {
    const value = this.entries.get(prompt);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    // Move to end (most recently used)
    this.entries.delete(prompt);
    this.entries.set(prompt, value);
    return value;
  }

  /**
   * Store a response; the first write for a prompt wins
   */
  set(prompt: string, response: string): void {
    if (this.entries.has(prompt)) {
      return;
    }
    if (this.entries.size >= this.maxEntries) {
      // Evict least recently used (first entry in Map)
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(prompt, response);
  }

  has(prompt: string): boolean {
    return this.entries.has(prompt);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxEntries: this.maxEntries,
    };
  }
}
