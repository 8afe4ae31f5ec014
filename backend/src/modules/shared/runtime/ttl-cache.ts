/**
 * TTL CACHE
 * =========
 *
 * Per-instance in-memory TTL cache. Each provider client owns one; there is
 * no module-level cache state.
 *
 * An entry is served only while now < expiresAt.
 */

import { type Clock, systemClock } from '../../../common/runtime.types.js';

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export interface TtlCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly defaultTtlMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Get value if not expired
   */
  get(key: string): T | null {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return null;
    }
    if (this.clock.now() >= e.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return e.value;
  }

  /**
   * Set value with TTL
   */
  set(key: string, value: T, ttlMs?: number): void {
    this.map.set(key, {
      value,
      expiresAt: this.clock.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  /**
   * Expiry instant of a live entry, or null
   */
  expiresAt(key: string): number | null {
    const e = this.map.get(key);
    if (!e || this.clock.now() >= e.expiresAt) return null;
    return e.expiresAt;
  }

  del(key: string): void {
    this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  size(): number {
    return this.map.size;
  }

  stats(): TtlCacheStats {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }
}
