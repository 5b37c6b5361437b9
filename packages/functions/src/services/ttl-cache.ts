interface CacheEntry<V> {
  value: V;
  createdAt: number;
}

export interface TtlCacheOptions {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
}

/**
 * Small insertion-ordered cache with a time-to-live per entry.
 * When full, the oldest fifth of the entries is evicted in one pass.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (this.now() - entry.createdAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.evictOldest();
    }
    this.entries.delete(key);
    this.entries.set(key, { value, createdAt: this.now() });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOldest(): void {
    const count = Math.max(1, Math.floor(this.maxSize / 5));
    const keys = [...this.entries.keys()].slice(0, count);
    for (const key of keys) {
      this.entries.delete(key);
    }
  }
}
