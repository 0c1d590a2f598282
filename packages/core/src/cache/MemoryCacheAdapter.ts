import type { CacheAdapter, CacheEntry, CacheStats } from '../types/cache.js';

import { CacheCounters } from './counters.js';

type NowFn = () => number;

type MemoryCacheOptions = {
  /** Key prefix; kept so keys look the same as in the redis adapter. */
  namespace?: string;

  /**
   * Time source override used in tests.
   *
   * Defaults to `Date.now`.
   */
  now?: NowFn;
};

/**
 * Simple in-memory TTL cache.
 *
 * This is the default cache driver. Expired entries are dropped lazily when
 * they are read or counted.
 */
export class MemoryCacheAdapter implements CacheAdapter {
  private readonly store = new Map<string, CacheEntry<string>>();
  private readonly counters = new CacheCounters();
  private readonly prefix: string;
  private readonly now: NowFn;

  constructor(options: MemoryCacheOptions = {}) {
    this.prefix = `${options.namespace ?? 'chatcache'}:`;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.live(this.prefix + key);
    if (!entry) {
      this.counters.recordMiss();
      return undefined;
    }
    this.counters.recordHit();
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const expiresAt = this.now() + Math.max(0, ttlSeconds) * 1000;
    this.store.set(this.prefix + key, { value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(this.prefix + key) !== undefined;
    this.store.delete(this.prefix + key);
    return existed;
  }

  async clearAll(): Promise<number> {
    const removed = this.purgeExpired();
    this.store.clear();
    return removed;
  }

  async stats(): Promise<CacheStats> {
    return this.counters.snapshot(this.purgeExpired());
  }

  async ping(): Promise<void> {}

  private live(fullKey: string): CacheEntry<string> | undefined {
    const entry = this.store.get(fullKey);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(fullKey);
      return undefined;
    }
    return entry;
  }

  /** Drop expired entries and return how many live ones remain. */
  private purgeExpired(): number {
    const now = this.now();
    for (const [fullKey, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(fullKey);
    }
    return this.store.size;
  }
}
