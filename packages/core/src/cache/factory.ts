import { ConfigError } from '../errors.js';
import type { CacheAdapter } from '../types/cache.js';
import type { CacheConfig } from '../types/config.js';

import { MemoryCacheAdapter } from './MemoryCacheAdapter.js';
import { RedisCacheAdapter } from './RedisCacheAdapter.js';
import { createUpstashStore } from './store.js';

/**
 * Create the cache adapter selected by `config.driver`.
 */
export function createCacheAdapter(config: CacheConfig): CacheAdapter {
  switch (config.driver) {
    case 'memory':
      return new MemoryCacheAdapter({ namespace: config.namespace });
    case 'redis': {
      if (!config.token) {
        throw new ConfigError(['cacheToken: CACHE_TOKEN is required when CACHE_DRIVER is "redis"']);
      }
      const store = createUpstashStore({ url: config.url, token: config.token });
      return new RedisCacheAdapter(store, { namespace: config.namespace });
    }
  }
}
