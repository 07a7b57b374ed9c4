export interface CacheEntry<T> {
  value: T;
  expiresAt: number; // epoch ms
}

export const cacheKey = (userId: string, ticker: string): string => `${userId}:${ticker}`;

/**
 * TTL cache with single-flight computation per key. Concurrent misses for one key share
 * a single `compute` call; a failed computation leaves nothing behind, so the next caller
 * tries again.
 */
export class RecommendationCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  isExpired(entry: CacheEntry<T>): boolean {
    return this.now() > entry.expiresAt;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async getOrCompute(key: string, ttlMs: number, compute: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const request = (async () => {
      try {
        const value = await compute();
        this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
        return value;
      } finally {
        this.inflight.delete(key);
      }
    })();
    this.inflight.set(key, request);
    return request;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  isComputing(key: string): boolean {
    return this.inflight.has(key);
  }

  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
