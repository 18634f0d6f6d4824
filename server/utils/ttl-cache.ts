export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * In-memory cache with a fixed time-to-live per entry.
 * Insertion order doubles as eviction order once maxEntries is reached.
 */
export class TtlCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number = Infinity,
    private readonly now: Clock = Date.now,
  ) {
    if (ttlMs <= 0) throw new Error("ttlMs must be positive");
    if (maxEntries < 1) throw new Error("maxEntries must be at least 1");
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    this.pruneExpired();
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  get size(): number {
    this.pruneExpired();
    return this.entries.size;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
