import type { InferenceHandler } from './inference.js';
import type { LogLevel } from './logger.js';

/**
 * Inference backends the proxy can talk to.
 *
 * `openai` covers any OpenAI-compatible chat-completions endpoint (set `baseUrl`).
 */
export const INFERENCE_PROVIDERS = ['openai', 'ollama', 'mock', 'custom'] as const;

export type InferenceProviderName = (typeof INFERENCE_PROVIDERS)[number];

/**
 * Configuration for the inference client.
 */
export type InferenceClientConfig = {
  /** Which provider implementation to use. */
  provider: InferenceProviderName;

  /** Provider API key. Never logged. */
  apiKey?: string;

  /** Default model identifier. */
  model: string;

  /** Base URL override for hosted or self-hosted OpenAI-compatible endpoints. */
  baseUrl?: string;

  /** Handler invoked when `provider` is `custom`. */
  customHandler?: InferenceHandler;

  /**
   * Per-attempt timeout in milliseconds.
   *
   * Defaults to 30s.
   */
  timeoutMs?: number;

  /**
   * Maximum number of attempts for a single call, including the first.
   *
   * Defaults to 3.
   */
  maxAttempts?: number;

  /** Delay before the second attempt; doubles for each attempt after that. Defaults to 500ms. */
  backoffBaseMs?: number;

  /**
   * Upper bound (exclusive) of the random jitter added to each backoff delay.
   * Defaults to 100ms.
   */
  backoffJitterMs?: number;

  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
};

export type CacheDriver = 'memory' | 'redis';

export type CacheConfig = {
  driver: CacheDriver;

  /** REST endpoint of the Redis store (`redis` driver only). */
  url: string;

  /** REST token of the Redis store (`redis` driver only). Never logged. */
  token?: string;

  /** Entry lifetime. */
  ttlSeconds: number;

  /** Key prefix owned by this application. */
  namespace: string;
};

export type OrchestratorConfig = {
  /** Model used when a request does not name one. */
  defaultModel: string;

  /** Longest accepted query, in characters, after trimming. */
  maxQueryLength: number;

  /** Lifetime of entries written after a cache miss. */
  cacheTtlSeconds: number;

  /**
   * Overall deadline for the inference part of a request, in milliseconds.
   *
   * `0` disables the deadline.
   */
  requestTimeoutMs: number;
};

export type ServerConfig = {
  host: string;
  port: number;
};

/**
 * Fully resolved proxy configuration.
 *
 * Built once at startup and passed to constructors; business logic never reads
 * the environment directly.
 */
export interface ProxyConfig {
  inference: InferenceClientConfig;
  cache: CacheConfig;
  orchestrator: OrchestratorConfig;
  server: ServerConfig;
  logLevel: LogLevel;
}
