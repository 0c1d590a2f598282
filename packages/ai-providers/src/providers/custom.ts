import type { InferenceClientConfig, InferenceHandler } from '@chatcache/core/types';

import { BaseInferenceClient } from '../base.js';
import type { InferenceClientOptions, ProviderCompletion, ProviderRequest } from '../base.js';

/**
 * Adapter that wraps a caller-supplied `InferenceHandler` into the standard
 * client, so custom integrations still get retries and timeouts.
 */
export class CustomInferenceClient extends BaseInferenceClient {
  private readonly handler: InferenceHandler;

  constructor(
    config: InferenceClientConfig,
    handler: InferenceHandler,
    options?: InferenceClientOptions,
  ) {
    super(config, options);
    this.handler = handler;
  }

  protected async rawComplete(
    request: ProviderRequest,
    signal: AbortSignal,
  ): Promise<ProviderCompletion> {
    return await this.handler(request, signal);
  }

  /** A handler has no separate reachability check. */
  async healthCheck(): Promise<void> {}
}
