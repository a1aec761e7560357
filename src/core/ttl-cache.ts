/**
 * In-memory Map whose entries expire a fixed time after they were written.
 * Expired entries read as absent and are dropped lazily; the size is bounded
 * with the oldest entry evicted first.
 */

interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

export interface TtlCacheOptions {
  /** Entries older than this are treated as absent */
  ttlMs: number;
  /** Upper bound on tracked keys; the oldest entry is evicted first */
  maxEntries?: number;
}

const DEFAULT_MAX_ENTRIES = 1000;

export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private ttlMs: number;
  private maxEntries: number;

  constructor(options: TtlCacheOptions) {
    if (options.ttlMs <= 0) {
      throw new Error('Cache TTL must be positive');
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  }

  /**
   * Store a value, replacing any previous one for the key
   */
  put(key: string, value: V): void {
    // Re-insert so Map iteration order stays oldest-first
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries && this.sweep() === 0) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { value, storedAt: Date.now() });
  }

  /**
   * Read a live value without consuming it
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry, Date.now())) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  /**
   * Remove and return the value if it has not expired
   *
   * @returns The value, or undefined when absent or expired
   */
  take(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(key);

    if (this.isExpired(entry, Date.now())) {
      return undefined;
    }

    return entry.value;
  }

  /**
   * Drop every expired entry. put() sweeps before evicting a live entry.
   *
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.storedAt > this.ttlMs;
  }
}
