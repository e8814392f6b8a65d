export const DEFAULT_CACHE_CAPACITY = 128;

interface CacheEntry<T> {
  value: T;
}

/**
 * Bounded least-recently-used map. Recency is Map insertion order: a hit
 * re-inserts the entry, an insert past capacity drops the oldest key.
 */
export class LruCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_CACHE_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) this.entries.delete(key);
    this.entries.set(key, { value });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
