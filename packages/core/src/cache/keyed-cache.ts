/**
 * Keyed TTL cache with single-flight loading
 *
 * - A fresh entry (younger than ttlMs) is returned without calling the loader.
 * - Concurrent misses on the same key share one loader call.
 * - A failed load is never cached. If the expired entry is still inside the
 *   grace window it is returned marked `degraded`, otherwise the error propagates.
 * - Entries are replaced, never mutated, so a reader keeps whatever it was handed.
 */

export type Clock = () => number;

export interface KeyedCacheOptions {
  ttlMs: number;
  /** How long past expiry a stale value may stand in for a failed refresh */
  graceMs?: number;
  /** Oldest entries are dropped beyond this size (default: unbounded) */
  maxEntries?: number;
  now?: Clock;
}

export interface CacheResult<V> {
  value: V;
  degraded: boolean;
  storedAt: number;
  /** true when the value came from an existing entry rather than a load by this call */
  hit: boolean;
}

interface Entry<V> {
  value: V;
  storedAt: number;
}

/**
 * Collapses concurrent calls for the same key onto one promise.
 * The key is released as soon as the promise settles.
 */
export class SingleFlight<T> {
  private inflight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      if (this.inflight.get(key) === promise) this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }
}

export class KeyedCache<V> {
  private entries = new Map<string, Entry<V>>();
  private flights = new SingleFlight<CacheResult<V>>();
  private ttlMs: number;
  private graceMs: number;
  private maxEntries: number;
  private now: Clock;

  constructor(options: KeyedCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.graceMs = options.graceMs ?? 0;
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
  }

  async get(key: string, load: () => Promise<V>): Promise<CacheResult<V>> {
    const entry = this.entries.get(key);
    if (entry && this.isFresh(entry)) {
      return { value: entry.value, degraded: false, storedAt: entry.storedAt, hit: true };
    }

    return this.flights.run(key, () => this.refresh(key, load));
  }

  /** Current entry for a key, fresh or not */
  peek(key: string): { value: V; storedAt: number; fresh: boolean } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return { value: entry.value, storedAt: entry.storedAt, fresh: this.isFresh(entry) };
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys currently being loaded */
  get loading(): number {
    return this.flights.size;
  }

  private async refresh(key: string, load: () => Promise<V>): Promise<CacheResult<V>> {
    let value: V;
    try {
      value = await load();
    } catch (error) {
      const stale = this.entries.get(key);
      if (stale && this.now() - stale.storedAt < this.ttlMs + this.graceMs) {
        return { value: stale.value, degraded: true, storedAt: stale.storedAt, hit: true };
      }
      throw error;
    }

    const storedAt = this.now();
    // Re-insert so Map order tracks insertion age
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt });
    this.evictOverflow();
    return { value, degraded: false, storedAt, hit: false };
  }

  private isFresh(entry: Entry<V>): boolean {
    return this.now() - entry.storedAt < this.ttlMs;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
