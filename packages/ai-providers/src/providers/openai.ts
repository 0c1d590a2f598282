import OpenAI from 'openai';

import type { InferenceClientConfig } from '@chatcache/core/types';

import { BaseInferenceClient } from '../base.js';
import type { InferenceClientOptions, ProviderCompletion, ProviderRequest } from '../base.js';
import { InferenceError } from '../errors.js';

/**
 * OpenAI-compatible chat-completions adapter.
 *
 * Notes:
 * - Works against any endpoint speaking the OpenAI API; set `baseUrl` for
 *   hosted gateways or self-hosted servers.
 * - The SDK's own retries are disabled; `BaseInferenceClient` owns the policy.
 */
export class OpenAIInferenceClient extends BaseInferenceClient {
  private readonly client: OpenAI;

  constructor(config: InferenceClientConfig, options?: InferenceClientOptions) {
    super(config, options);
    if (!config.apiKey) throw new InferenceError('OpenAI apiKey is required', { retryable: false });

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  /**
   * Perform a single chat-completion request.
   *
   * The base class wraps this in retry/timeout/cancellation logic.
   */
  protected async rawComplete(
    request: ProviderRequest,
    signal: AbortSignal,
  ): Promise<ProviderCompletion> {
    const { query, model, params } = request;

    const response = await this.client.chat.completions.create(
      {
        model,
        messages: [
          ...(params.systemPrompt
            ? [{ role: 'system' as const, content: params.systemPrompt }]
            : []),
          { role: 'user' as const, content: query },
        ],
        max_tokens: params.maxTokens,
        temperature: params.temperature,
      },
      { signal },
    );

    return {
      text: response.choices[0]?.message?.content ?? '',
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
          }
        : undefined,
    };
  }

  /**
   * Lists models; succeeds whenever the endpoint is reachable and accepts the key.
   */
  async healthCheck(): Promise<void> {
    await this.checkReachable(async (signal) => {
      await this.client.models.list({ signal });
    });
  }
}
