import type {
  CompleteOptions,
  GenerationParams,
  InferenceClient,
  InferenceClientConfig,
  InferenceResult,
  Logger,
  RetryState,
  TokenUsage,
} from '@chatcache/core/types';
import { DEFAULT_SYSTEM_PROMPT, silentLogger } from '@chatcache/core';

import {
  InferenceAbortedError,
  InferenceTimeoutError,
  InferenceTransientError,
  InferenceUnavailableError,
  toInferenceError,
} from './errors.js';
import type { InferenceError } from './errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_BASE_MS = 500;
const DEFAULT_BACKOFF_JITTER_MS = 100;
const DEFAULT_MAX_TOKENS = 500;
const DEFAULT_TEMPERATURE = 0.7;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Test and observability hooks. None of these are read from configuration.
 */
export type InferenceClientOptions = {
  logger?: Logger;

  /**
   * Sleep implementation override used in tests.
   *
   * Defaults to a `setTimeout`-based sleep that resolves early on abort.
   */
  sleep?: SleepFn;

  /**
   * Random source for backoff jitter, returning values in `[0, 1)`.
   *
   * Defaults to `Math.random`.
   */
  random?: () => number;

  /** Called before every backoff wait. */
  onRetry?: (state: RetryState) => void;
};

/**
 * A single request as handed to a concrete provider.
 */
export type ProviderRequest = {
  query: string;
  model: string;
  params: Required<GenerationParams>;
};

/**
 * What a concrete provider returns from one raw attempt.
 */
export type ProviderCompletion = {
  text: string;
  usage?: TokenUsage;
};

const defaultSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });

/**
 * Run one attempt with its own timeout.
 *
 * The attempt gets a signal that aborts on timeout or when `outer` aborts. The
 * returned promise settles as soon as either happens, even if the provider
 * ignores its signal.
 */
async function runAttempt<T>(
  attempt: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer: AbortSignal | undefined,
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onOuterAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new InferenceTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    onOuterAbort = () => {
      controller.abort(outer?.reason);
      reject(new InferenceAbortedError({ cause: outer?.reason }));
    };
    outer?.addEventListener('abort', onOuterAbort, { once: true });
  });

  try {
    return await Promise.race([attempt(controller.signal), interrupted]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
    if (onOuterAbort) outer?.removeEventListener('abort', onOuterAbort);
  }
}

/**
 * Base implementation shared by all inference clients.
 *
 * - Retry: up to `maxAttempts` attempts in total; only `retryable` failures retry
 * - Backoff: `backoffBaseMs * 2^(n-2)` plus jitter before attempt `n`
 * - Timeout: per attempt via `timeoutMs` (default 30s)
 * - Cancellation: the caller's signal stops the current attempt and any wait
 */
export abstract class BaseInferenceClient implements InferenceClient {
  protected readonly config: InferenceClientConfig;
  protected readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly backoffJitterMs: number;
  private readonly defaults: Required<GenerationParams>;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly onRetry: ((state: RetryState) => void) | undefined;

  constructor(config: InferenceClientConfig, options: InferenceClientOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, Math.floor(config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.backoffBaseMs = config.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.backoffJitterMs = config.backoffJitterMs ?? DEFAULT_BACKOFF_JITTER_MS;
    this.defaults = {
      maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      systemPrompt: config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  /**
   * Implemented by concrete providers to perform a single raw completion request.
   *
   * Implementations should pass `signal` to their HTTP call and may throw
   * anything; the base class classifies failures with `toInferenceError`.
   */
  protected abstract rawComplete(
    request: ProviderRequest,
    signal: AbortSignal,
  ): Promise<ProviderCompletion>;

  abstract healthCheck(): Promise<void>;

  /**
   * Run a reachability check under the per-attempt timeout. Rejects with
   * `InferenceTimeoutError` when the check stalls, even if it ignores `signal`.
   */
  protected async checkReachable(check: (signal: AbortSignal) => Promise<void>): Promise<void> {
    await runAttempt(check, this.timeoutMs, undefined);
  }

  /**
   * Delay before attempt `attempt` (2-based; there is no wait before the first).
   */
  backoffDelayMs(attempt: number): number {
    const factor = 2 ** Math.max(0, attempt - 2);
    const jitter = Math.floor(this.random() * this.backoffJitterMs);
    return this.backoffBaseMs * factor + jitter;
  }

  async complete(
    query: string,
    model: string,
    params: GenerationParams = {},
    options: CompleteOptions = {},
  ): Promise<InferenceResult> {
    const startedAt = Date.now();
    const { signal } = options;
    const request: ProviderRequest = {
      query,
      model,
      params: {
        maxTokens: params.maxTokens ?? this.defaults.maxTokens,
        temperature: params.temperature ?? this.defaults.temperature,
        systemPrompt: params.systemPrompt ?? this.defaults.systemPrompt,
      },
    };

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new InferenceAbortedError({ cause: signal.reason });

      let failure: InferenceError;
      try {
        const completion = await runAttempt(
          (attemptSignal) => this.rawComplete(request, attemptSignal),
          this.timeoutMs,
          signal,
        );
        if (completion.text.trim().length === 0) {
          throw new InferenceTransientError('Inference provider returned an empty completion');
        }
        return {
          text: completion.text,
          model,
          attempts: attempt,
          latencyMs: Date.now() - startedAt,
          usage: completion.usage,
        };
      } catch (error) {
        if (signal?.aborted) {
          throw error instanceof InferenceAbortedError
            ? error
            : new InferenceAbortedError({ cause: error });
        }
        failure = toInferenceError(error);
      }

      if (!failure.retryable) throw failure;
      if (attempt >= this.maxAttempts) {
        throw new InferenceUnavailableError(attempt, { cause: failure });
      }

      const delayMs = this.backoffDelayMs(attempt + 1);
      this.onRetry?.({ attempt, maxAttempts: this.maxAttempts, lastError: failure, delayMs });
      this.logger.warn('inference attempt failed; retrying', {
        attempt,
        maxAttempts: this.maxAttempts,
        delayMs,
        error: failure.message,
      });
      await this.sleep(delayMs, signal);
    }
  }
}
