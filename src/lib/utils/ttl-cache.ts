/**
 * In-memory cache whose freshness is decided at read time.
 *
 * Entries only remember when they were written. Each `get` supplies the
 * maximum age the caller will accept, so the same key can be read with
 * different freshness requirements by different callers. Stale entries are
 * evicted as soon as a reader sees them.
 */

export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  createdAt: number;
}

export interface TtlCacheStats {
  entries: number;
  pendingLoads: number;
}

export class TtlCache<V = unknown> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();

  constructor(private readonly now: Clock = Date.now) {}

  /** Value for `key` if it was written less than `ttlMs` ago. */
  get(key: string, ttlMs: number): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.createdAt >= ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, createdAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Evicts every entry older than `ttlMs`; returns how many were removed. */
  pruneExpired(ttlMs: number): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.createdAt >= ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): TtlCacheStats {
    return { entries: this.entries.size, pendingLoads: this.inFlight.size };
  }

  /**
   * Cache-first load. Concurrent callers asking for the same missing key share
   * one loader call. The loaded value is only stored when `shouldStore` accepts
   * it (e.g. skip empty upstream responses).
   */
  async getOrLoad(
    key: string,
    ttlMs: number,
    loader: () => Promise<V>,
    shouldStore: (value: V) => boolean = () => true
  ): Promise<{ value: V; hit: boolean }> {
    const cached = this.get(key, ttlMs);
    if (cached !== undefined) return { value: cached, hit: true };

    const pending = this.inFlight.get(key);
    if (pending) return { value: await pending, hit: true };

    const load = loader()
      .then((value) => {
        if (shouldStore(value)) this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, load);
    return { value: await load, hit: false };
  }
}
