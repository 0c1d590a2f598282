import { describe, expect, it } from 'vitest';

import type { InferenceClientConfig } from '@chatcache/core/types';

import { createInferenceClient } from './factory.js';
import { CustomInferenceClient } from './providers/custom.js';
import { MockInferenceClient } from './providers/mock.js';
import { OllamaInferenceClient } from './providers/ollama.js';
import { OpenAIInferenceClient } from './providers/openai.js';

function config(overrides: Partial<InferenceClientConfig>): InferenceClientConfig {
  return { provider: 'mock', model: 'test-model', ...overrides };
}

describe('createInferenceClient', () => {
  it('creates the client for each provider', () => {
    const openai = createInferenceClient(config({ provider: 'openai', apiKey: 'test-key' }));
    expect(openai).toBeInstanceOf(OpenAIInferenceClient);
    const ollama = createInferenceClient(config({ provider: 'ollama' }));
    expect(ollama).toBeInstanceOf(OllamaInferenceClient);
    expect(createInferenceClient(config({ provider: 'mock' }))).toBeInstanceOf(MockInferenceClient);
  });

  it('requires an api key for openai', () => {
    expect(() => createInferenceClient(config({ provider: 'openai' }))).toThrow(
      'OpenAI apiKey is required',
    );
  });

  it('requires a handler for custom', () => {
    expect(() => createInferenceClient(config({ provider: 'custom' }))).toThrow(
      'customHandler is required when provider is "custom"',
    );
  });

  it('routes custom requests through the handler', async () => {
    const client = createInferenceClient(
      config({
        provider: 'custom',
        customHandler: async ({ query, model, params }) => ({
          text: `${model}/${params.maxTokens}: ${query}`,
        }),
      }),
    );

    expect(client).toBeInstanceOf(CustomInferenceClient);
    const result = await client.complete('ping', 'test-model');
    expect(result.text).toBe('test-model/500: ping');
  });

  it('answers deterministically with the mock provider', async () => {
    const client = createInferenceClient(config({ provider: 'mock' }));
    const result = await client.complete('What is Redis?', 'test-model');

    expect(result.text).toBe('Mock response from test-model to: What is Redis?');
    expect(result.attempts).toBe(1);
  });
});
