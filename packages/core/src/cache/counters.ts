import type { CacheStats } from '../types/cache.js';

/**
 * Process-wide hit/miss counters shared by the cache adapters.
 */
export class CacheCounters {
  private hits = 0;
  private misses = 0;

  recordHit(): void {
    this.hits += 1;
  }

  recordMiss(): void {
    this.misses += 1;
  }

  snapshot(keys: number): CacheStats {
    const { hits, misses } = this;
    return { hits, misses, keys, hitRate: hits / Math.max(1, hits + misses) };
  }
}
