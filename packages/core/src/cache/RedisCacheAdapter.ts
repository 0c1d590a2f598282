import { CacheUnavailableError } from '../errors.js';
import type { CacheAdapter, CacheStats } from '../types/cache.js';

import { CacheCounters } from './counters.js';
import type { KeyValueStore } from './store.js';

const SCAN_PAGE_SIZE = 200;
const DELETE_CHUNK_SIZE = 500;

/**
 * Cache adapter backed by a Redis store.
 *
 * Every key lives under `<namespace>:`. `clearAll()` and `stats()` walk that
 * prefix with `SCAN`, so other data in the same database is left alone.
 * Store failures surface as `CacheUnavailableError`.
 */
export class RedisCacheAdapter implements CacheAdapter {
  private readonly counters = new CacheCounters();
  private readonly prefix: string;

  constructor(
    private readonly store: KeyValueStore,
    options: { namespace?: string } = {},
  ) {
    this.prefix = `${options.namespace ?? 'chatcache'}:`;
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.guard('get', () => this.store.get(this.prefix + key));
    if (value === null) {
      this.counters.recordMiss();
      return undefined;
    }
    this.counters.recordHit();
    return value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.guard('set', () => this.store.setEx(this.prefix + key, value, ttlSeconds));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.guard('delete', () => this.store.del([this.prefix + key]));
    return removed > 0;
  }

  async clearAll(): Promise<number> {
    return await this.guard('clear', async () => {
      const keys = await this.scanNamespace();
      let removed = 0;
      for (let i = 0; i < keys.length; i += DELETE_CHUNK_SIZE) {
        removed += await this.store.del(keys.slice(i, i + DELETE_CHUNK_SIZE));
      }
      return removed;
    });
  }

  async stats(): Promise<CacheStats> {
    const keys = await this.guard('stats', () => this.scanNamespace());
    return this.counters.snapshot(keys.length);
  }

  async ping(): Promise<void> {
    await this.guard('ping', () => this.store.ping());
  }

  /** SCAN may return a key more than once; the set removes duplicates. */
  private async scanNamespace(): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';
    do {
      const page = await this.store.scan(cursor, `${this.prefix}*`, SCAN_PAGE_SIZE);
      for (const key of page.keys) keys.add(key);
      cursor = page.cursor;
    } while (cursor !== '0');
    return [...keys];
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new CacheUnavailableError(operation, { cause: error });
    }
  }
}
