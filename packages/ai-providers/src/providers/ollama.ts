import { z } from 'zod';

import type { InferenceClientConfig } from '@chatcache/core/types';

import { BaseInferenceClient } from '../base.js';
import type { InferenceClientOptions, ProviderCompletion, ProviderRequest } from '../base.js';
import { errorForStatus, InferenceTransientError } from '../errors.js';

const ollamaChatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

type FetchFn = typeof fetch;

/**
 * Adapter for a local Ollama server, using its HTTP API directly (no SDK).
 */
export class OllamaInferenceClient extends BaseInferenceClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(
    config: InferenceClientConfig,
    options: InferenceClientOptions & { fetch?: FetchFn } = {},
  ) {
    super(config, options);
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  protected async rawComplete(
    request: ProviderRequest,
    signal: AbortSignal,
  ): Promise<ProviderCompletion> {
    const { query, model, params } = request;

    const response = await this.fetchFn(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        model,
        stream: false,
        messages: [
          ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
          { role: 'user', content: query },
        ],
        options: { temperature: params.temperature, num_predict: params.maxTokens },
      }),
      signal,
    });

    if (!response.ok) throw errorForStatus(response.status);

    const parsed = ollamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceTransientError('Ollama returned an unexpected response body', {
        cause: parsed.error,
      });
    }
    const data = parsed.data;
    return {
      text: data.message?.content ?? '',
      usage: {
        promptTokens: data.prompt_eval_count ?? 0,
        completionTokens: data.eval_count ?? 0,
      },
    };
  }

  async healthCheck(): Promise<void> {
    await this.checkReachable(async (signal) => {
      const response = await this.fetchFn(`${this.baseUrl}/api/tags`, { signal });
      if (!response.ok) throw errorForStatus(response.status);
    });
  }
}
