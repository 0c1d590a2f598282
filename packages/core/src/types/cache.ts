/**
 * Cache entry wrapper used by in-process TTL caches.
 */
export interface CacheEntry<T> {
  /** Cached value. */
  value: T;

  /** Expiration timestamp in milliseconds since epoch. */
  expiresAt: number;
}

/**
 * Aggregate counters reported by `CacheAdapter.stats()`.
 *
 * `hits` and `misses` are process-wide and reset on restart. `keys` is read
 * from the store at call time.
 */
export interface CacheStats {
  hits: number;
  misses: number;
  keys: number;

  /** `hits / max(1, hits + misses)`. */
  hitRate: number;
}

/**
 * Key-value cache used for chat responses.
 *
 * Keys passed in are bare digests; adapters prefix them with their namespace.
 * A miss is a normal outcome (`undefined`), while an unreachable store raises
 * `CacheUnavailableError`.
 *
 * Implementations:
 * - in-memory (default, development and tests)
 * - redis over the Upstash REST protocol
 */
export interface CacheAdapter {
  get(key: string): Promise<string | undefined>;

  /** Store `value`, replacing any existing entry and refreshing its TTL. */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** Remove a single entry. Resolves `true` when something was deleted. */
  delete(key: string): Promise<boolean>;

  /** Remove every entry under this adapter's namespace and return how many were removed. */
  clearAll(): Promise<number>;

  stats(): Promise<CacheStats>;

  /** Reachability check; rejects when the store cannot be reached. */
  ping(): Promise<void>;
}

/**
 * Shape stored under each cache key.
 */
export interface CachedChatEntry {
  /** Model output text. */
  text: string;

  /** Model that produced `text`. */
  model: string;

  /** Generation time in milliseconds since epoch. */
  createdAt: number;
}
