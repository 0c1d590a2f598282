import { Redis } from '@upstash/redis';

/**
 * The handful of Redis commands the cache needs.
 *
 * `RedisCacheAdapter` talks to this port rather than to a client library so
 * tests can run it against an in-memory store.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  /** `SET key value EX ttlSeconds` */
  setEx(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** Delete `keys` and return how many existed. */
  del(keys: string[]): Promise<number>;

  /** One `SCAN` page. A returned cursor of `"0"` ends the iteration. */
  scan(cursor: string, match: string, count: number): Promise<{ cursor: string; keys: string[] }>;

  ping(): Promise<void>;
}

/**
 * Build a `KeyValueStore` on top of `@upstash/redis`.
 *
 * Values are stored as plain strings: automatic JSON (de)serialization is
 * turned off because the cache layer serializes entries itself.
 */
export function createUpstashStore(options: { url: string; token: string }): KeyValueStore {
  const redis = new Redis({
    url: options.url,
    token: options.token,
    automaticDeserialization: false,
  });

  return {
    async get(key) {
      return await redis.get<string>(key);
    },
    async setEx(key, value, ttlSeconds) {
      await redis.set(key, value, { ex: ttlSeconds });
    },
    async del(keys) {
      if (keys.length === 0) return 0;
      return await redis.del(...keys);
    },
    async scan(cursor, match, count) {
      const [next, keys] = await redis.scan(cursor, { match, count });
      return { cursor: String(next), keys };
    },
    async ping() {
      await redis.ping();
    },
  };
}
