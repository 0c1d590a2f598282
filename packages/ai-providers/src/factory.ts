import type { InferenceClient, InferenceClientConfig } from '@chatcache/core/types';

import type { InferenceClientOptions } from './base.js';
import { CustomInferenceClient } from './providers/custom.js';
import { MockInferenceClient } from './providers/mock.js';
import { OllamaInferenceClient } from './providers/ollama.js';
import { OpenAIInferenceClient } from './providers/openai.js';

/**
 * Create an inference client from config.
 *
 * - `openai`: any OpenAI-compatible endpoint via the `openai` SDK.
 * - `ollama`: uses direct HTTP calls (no SDK dependency).
 * - `custom`: uses the provided `customHandler`.
 * - `mock`: deterministic answers for local development.
 */
export function createInferenceClient(
  config: InferenceClientConfig,
  options?: InferenceClientOptions,
): InferenceClient {
  switch (config.provider) {
    case 'openai':
      return new OpenAIInferenceClient(config, options);
    case 'ollama':
      return new OllamaInferenceClient(config, options);
    case 'custom': {
      if (!config.customHandler) {
        throw new Error('customHandler is required when provider is "custom"');
      }
      return new CustomInferenceClient(config, config.customHandler, options);
    }
    case 'mock':
      return new MockInferenceClient(config, options);
  }
}
