import { BaseInferenceClient } from '../base.js';
import type { ProviderCompletion, ProviderRequest } from '../base.js';

/**
 * Deterministic mock client.
 *
 * Intended for local development without a provider key: the same query
 * always yields the same answer, and no network is touched.
 */
export class MockInferenceClient extends BaseInferenceClient {
  protected async rawComplete(request: ProviderRequest): Promise<ProviderCompletion> {
    const text = `Mock response from ${request.model} to: ${request.query}`;
    return {
      text,
      usage: {
        promptTokens: request.query.split(/\s+/).length,
        completionTokens: text.split(/\s+/).length,
      },
    };
  }

  async healthCheck(): Promise<void> {}
}
