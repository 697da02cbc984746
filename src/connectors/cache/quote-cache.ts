interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

/**
 * Per-key TTL cache. An entry is served while `now - storedAt < ttlMs`;
 * a TTL of 0 disables caching.
 */
export class QuoteCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly ttlMs: number) {}

  get(key: string, now: number = Date.now()): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (now - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T, now: number = Date.now()): void {
    this.entries.set(key, { value, storedAt: now });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
