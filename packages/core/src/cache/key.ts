import { createHash } from 'node:crypto';

/**
 * Bumped whenever the key layout or the stored entry shape changes, so old
 * entries are simply never read again.
 */
export const CACHE_KEY_VERSION = 'v1';

/**
 * Canonical form of a query for cache lookups: trimmed, lowercased, with every
 * whitespace run collapsed to a single space.
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Create a stable SHA-256 hex digest for a string.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Derive the cache key for a query/model pair.
 *
 * Keyed by:
 * - key layout version
 * - model identifier
 * - normalized query text
 *
 * The namespace prefix is added by the cache adapter, not here.
 */
export function deriveCacheKey(query: string, model: string): string {
  return sha256Hex([CACHE_KEY_VERSION, model, normalizeQuery(query)].join('\n'));
}
