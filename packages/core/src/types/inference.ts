/**
 * Sampling and prompt parameters sent with every completion.
 */
export interface GenerationParams {
  /** Upper bound on completion tokens. */
  maxTokens?: number;

  /** Sampling temperature. */
  temperature?: number;

  /** System prompt placed ahead of the user query. */
  systemPrompt?: string;
}

/**
 * Token accounting when the provider returns it.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

/**
 * Result of a successful `InferenceClient.complete()` call.
 */
export interface InferenceResult {
  /** Model output text. */
  text: string;

  /** Model the request was sent to. */
  model: string;

  /** How many attempts were made, including the successful one. */
  attempts: number;

  /** End-to-end latency including retries and backoff waits. */
  latencyMs: number;

  usage?: TokenUsage;
}

export interface CompleteOptions {
  /** Aborts the in-flight attempt and any pending backoff wait. */
  signal?: AbortSignal;
}

/**
 * Provider-agnostic chat-completion client.
 *
 * Implementations own the retry policy; callers only see the final outcome.
 */
export interface InferenceClient {
  complete(
    query: string,
    model: string,
    params?: GenerationParams,
    options?: CompleteOptions,
  ): Promise<InferenceResult>;

  /** Cheap reachability check used by the health route. */
  healthCheck(): Promise<void>;
}

/**
 * Caller-supplied completion function used by the `custom` provider.
 */
export interface InferenceHandler {
  (
    request: { query: string; model: string; params: Required<GenerationParams> },
    signal: AbortSignal,
  ): Promise<{ text: string; usage?: TokenUsage }>;
}

/**
 * Per-call retry bookkeeping passed to `onRetry` observers.
 */
export interface RetryState {
  /** Number of the attempt that just failed (1-based). */
  attempt: number;

  maxAttempts: number;

  /** Failure that triggered the retry. */
  lastError: Error;

  /** Wait before the next attempt. */
  delayMs: number;
}
