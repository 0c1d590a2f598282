import { ChatOrchestrator, createCacheAdapter, createLogger } from '@chatcache/core';
import type { CacheAdapter, InferenceClient, Logger, ProxyConfig } from '@chatcache/core';
import { createInferenceClient } from '@chatcache/ai-providers';

import { createApp } from './app.js';
import type { FetchHandler } from './app.js';

/**
 * Everything a running proxy needs, wired from one `ProxyConfig`.
 */
export interface Runtime {
  config: ProxyConfig;
  logger: Logger;
  cache: CacheAdapter;
  inference: InferenceClient;
  orchestrator: ChatOrchestrator;
  handler: FetchHandler;
}

/**
 * Build the runtime. `overrides` replace individual collaborators (tests use
 * this to swap in fakes).
 */
export function createRuntime(
  config: ProxyConfig,
  overrides: { logger?: Logger; cache?: CacheAdapter; inference?: InferenceClient } = {},
): Runtime {
  const logger = overrides.logger ?? createLogger('chatcache', { level: config.logLevel });
  const cache = overrides.cache ?? createCacheAdapter(config.cache);
  const inference =
    overrides.inference ??
    createInferenceClient(config.inference, { logger: logger.child('inference') });

  const orchestrator = new ChatOrchestrator({
    cache,
    inference,
    config: config.orchestrator,
    params: {
      maxTokens: config.inference.maxTokens,
      temperature: config.inference.temperature,
      systemPrompt: config.inference.systemPrompt,
    },
    logger: logger.child('orchestrator'),
  });

  const handler = createApp({ orchestrator, cache, inference, logger: logger.child('http') });

  return { config, logger, cache, inference, orchestrator, handler };
}
