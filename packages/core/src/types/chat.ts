/**
 * Outcome of `ChatOrchestrator.handle()`.
 */
export interface ChatResult {
  /** Trimmed query as received. */
  query: string;

  /** Model output text. */
  text: string;

  /** `true` when the text came from the cache rather than a fresh inference call. */
  cached: boolean;

  /** Model that produced the text. */
  model: string;

  /**
   * When the text was generated (epoch ms). For cache hits this is the
   * original generation time.
   */
  createdAt: number;

  /** Time spent inside the orchestrator for this call. */
  latencyMs: number;
}

export interface HandleOptions {
  /** Fires when the caller goes away; aborts the inference call. */
  signal?: AbortSignal;
}
