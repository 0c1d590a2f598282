import type { CacheAdapter, CachedChatEntry } from '../types/cache.js';
import type { ChatResult, HandleOptions } from '../types/chat.js';
import type { OrchestratorConfig } from '../types/config.js';
import type { GenerationParams, InferenceClient } from '../types/inference.js';
import type { Logger } from '../types/logger.js';

import { deriveCacheKey } from '../cache/key.js';
import { withDeadline } from '../utils/deadline.js';
import { describeError, silentLogger, truncateForLog } from '../utils/logger.js';

import { parseEntry, serializeEntry } from './entry.js';
import { resolveModel, validateQuery } from './validate.js';

type NowFn = () => number;

export type ChatOrchestratorOptions = {
  cache: CacheAdapter;
  inference: InferenceClient;
  config: OrchestratorConfig;

  /** Generation parameters sent with every inference call. */
  params?: GenerationParams;

  logger?: Logger;

  /**
   * Time source override used in tests.
   *
   * Defaults to `Date.now`.
   */
  now?: NowFn;
};

/**
 * Cache-aside front for the inference client.
 *
 * - Reads fail open: a cache error is logged and handled as a miss.
 * - Writes are best-effort and happen only after a complete response.
 * - Inference errors propagate unchanged.
 */
export class ChatOrchestrator {
  private readonly cache: CacheAdapter;
  private readonly inference: InferenceClient;
  private readonly config: OrchestratorConfig;
  private readonly params: GenerationParams | undefined;
  private readonly logger: Logger;
  private readonly now: NowFn;

  constructor(options: ChatOrchestratorOptions) {
    this.cache = options.cache;
    this.inference = options.inference;
    this.config = options.config;
    this.params = options.params;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async handle(query: string, model?: string, options: HandleOptions = {}): Promise<ChatResult> {
    const startedAt = this.now();
    const trimmed = validateQuery(query, this.config.maxQueryLength);
    const resolvedModel = resolveModel(model, this.config.defaultModel);
    const key = deriveCacheKey(trimmed, resolvedModel);

    const hit = await this.readCache(key);
    if (hit) {
      this.logger.debug('cache hit', { key, query: truncateForLog(trimmed) });
      return {
        query: trimmed,
        text: hit.text,
        cached: true,
        model: hit.model,
        createdAt: hit.createdAt,
        latencyMs: this.now() - startedAt,
      };
    }

    this.logger.debug('cache miss', { key, query: truncateForLog(trimmed) });

    const result = await withDeadline(
      (signal) => this.inference.complete(trimmed, resolvedModel, this.params, { signal }),
      this.config.requestTimeoutMs,
      options.signal,
    );

    const entry: CachedChatEntry = {
      text: result.text,
      model: resolvedModel,
      createdAt: this.now(),
    };
    await this.writeCache(key, entry);

    this.logger.info('inference complete', {
      model: resolvedModel,
      attempts: result.attempts,
      latencyMs: result.latencyMs,
    });

    return {
      query: trimmed,
      text: entry.text,
      cached: false,
      model: resolvedModel,
      createdAt: entry.createdAt,
      latencyMs: this.now() - startedAt,
    };
  }

  /**
   * Drop the cached answer for one query. Unlike `handle`, cache errors propagate.
   */
  async invalidate(query: string, model?: string): Promise<boolean> {
    const trimmed = validateQuery(query, this.config.maxQueryLength);
    const key = deriveCacheKey(trimmed, resolveModel(model, this.config.defaultModel));
    return await this.cache.delete(key);
  }

  private async readCache(key: string): Promise<CachedChatEntry | undefined> {
    let raw: string | undefined;
    try {
      raw = await this.cache.get(key);
    } catch (error) {
      this.logger.warn('cache read failed; continuing without cache', describeError(error));
      return undefined;
    }
    if (raw === undefined) return undefined;

    const entry = parseEntry(raw);
    if (!entry) this.logger.warn('ignoring unreadable cache entry', { key });
    return entry;
  }

  private async writeCache(key: string, entry: CachedChatEntry): Promise<void> {
    try {
      await this.cache.set(key, serializeEntry(entry), this.config.cacheTtlSeconds);
    } catch (error) {
      this.logger.warn('cache write failed; response not cached', describeError(error));
    }
  }
}
