export * from './types/index.js';
export * from './errors.js';

export { CACHE_KEY_VERSION, deriveCacheKey, normalizeQuery, sha256Hex } from './cache/key.js';
export { CacheCounters } from './cache/counters.js';
export { MemoryCacheAdapter } from './cache/MemoryCacheAdapter.js';
export { RedisCacheAdapter } from './cache/RedisCacheAdapter.js';
export { createUpstashStore } from './cache/store.js';
export type { KeyValueStore } from './cache/store.js';
export { createCacheAdapter } from './cache/factory.js';

export { ChatOrchestrator } from './orchestrator/ChatOrchestrator.js';
export type { ChatOrchestratorOptions } from './orchestrator/ChatOrchestrator.js';
export { resolveModel, validateQuery } from './orchestrator/validate.js';

export {
  DEFAULT_MODEL,
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_SYSTEM_PROMPT,
  SETTING_NAMES,
  mergeSettings,
  redactConfig,
  resolveConfig,
  retryBudgetMs,
} from './config/settings.js';
export type { ProxySettings, SettingName } from './config/settings.js';
export { ENV_VARS, settingsFromEnv } from './config/env.js';

export { createLogger, describeError, silentLogger, truncateForLog } from './utils/logger.js';
export type { LogSink } from './utils/logger.js';
export { withDeadline } from './utils/deadline.js';
