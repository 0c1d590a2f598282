import { z } from 'zod';

import { ConfigError } from '../errors.js';
import type { ProxyConfig } from '../types/config.js';

export const DEFAULT_MODEL = 'openai/gpt-4.1-nano';

/**
 * Endpoint that serves `DEFAULT_MODEL`. Used when the provider is `openai` and no
 * `baseUrl` is set.
 */
export const DEFAULT_OPENAI_BASE_URL = 'https://models.github.ai/inference/v1';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful AI assistant. Provide clear, concise, and helpful responses.';

const positiveInt = z.coerce.number().int().positive();
const port = z.coerce.number().int().min(0).max(65_535);

/**
 * Flat settings schema shared by every configuration source.
 *
 * Values may arrive as strings (environment, CLI flags) or numbers (config
 * file), hence the coercion.
 */
const baseSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'mock']).default('openai'),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default(DEFAULT_MODEL),
  timeoutMs: positiveInt.default(30_000),
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.coerce.number().int().min(0).default(500),
  backoffJitterMs: z.coerce.number().int().min(0).default(100),
  maxTokens: positiveInt.default(500),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),

  cacheDriver: z.enum(['memory', 'redis']).default('memory'),
  cacheUrl: z.string().url().optional(),
  cacheHost: z.string().min(1).default('localhost'),
  cachePort: port.default(8079),
  cacheToken: z.string().min(1).optional(),
  cacheTtlSeconds: positiveInt.default(600),
  cacheNamespace: z
    .string()
    .regex(/^[A-Za-z0-9:_-]+$/, 'may only contain letters, digits, ":", "_" and "-"')
    .default('chatcache'),

  host: z.string().min(1).default('0.0.0.0'),
  port: port.default(8000),
  maxQueryLength: positiveInt.default(4000),
  requestTimeoutMs: z.coerce.number().int().min(0).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/** Slack on top of the retry budget in the default deadline; timers fire late. */
const DEADLINE_GRACE_MS = 1_000;

type RetrySettings = Pick<
  z.output<typeof baseSchema>,
  'maxAttempts' | 'timeoutMs' | 'backoffBaseMs' | 'backoffJitterMs'
>;

/**
 * Longest time a single inference call can take under the retry policy: every
 * attempt hitting its timeout, plus every backoff wait at its maximum jitter.
 */
export function retryBudgetMs(settings: RetrySettings): number {
  let budget = settings.maxAttempts * settings.timeoutMs;
  for (let attempt = 2; attempt <= settings.maxAttempts; attempt++) {
    budget += settings.backoffBaseMs * 2 ** (attempt - 2) + settings.backoffJitterMs;
  }
  return budget;
}

const settingsSchema = baseSchema.superRefine((settings, ctx) => {
  const { requestTimeoutMs } = settings;
  if (requestTimeoutMs !== undefined && requestTimeoutMs > 0) {
    const budget = retryBudgetMs(settings);
    if (requestTimeoutMs < budget) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['requestTimeoutMs'],
        message: `must be 0 or at least the inference retry budget (${budget}ms)`,
      });
    }
  }
  if (settings.provider === 'openai' && !settings.apiKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['apiKey'],
      message: 'API_KEY is required when the provider is "openai"',
    });
  }
  if (settings.cacheDriver === 'redis' && !settings.cacheToken) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cacheToken'],
      message: 'CACHE_TOKEN is required when CACHE_DRIVER is "redis"',
    });
  }
});

export type SettingName = keyof z.input<typeof baseSchema>;

export const SETTING_NAMES: readonly SettingName[] = baseSchema.keyof().options;

/**
 * Raw, unvalidated settings from one source (file, environment or flags).
 */
export type ProxySettings = Partial<Record<SettingName, string | number>>;

/**
 * Merge settings sources with precedence: earlier < later.
 *
 * `undefined` values never override.
 */
export function mergeSettings(...layers: ProxySettings[]): ProxySettings {
  const merged: ProxySettings = {};
  for (const layer of layers) {
    for (const name of SETTING_NAMES) {
      const value = layer[name];
      if (value !== undefined) merged[name] = value;
    }
  }
  return merged;
}

/**
 * Validate merged settings and build the `ProxyConfig` struct.
 *
 * @throws ConfigError listing every invalid setting
 */
export function resolveConfig(settings: ProxySettings): ProxyConfig {
  const parsed = settingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`),
    );
  }

  const s = parsed.data;
  return {
    inference: {
      provider: s.provider,
      apiKey: s.apiKey,
      model: s.model,
      baseUrl: s.baseUrl ?? (s.provider === 'openai' ? DEFAULT_OPENAI_BASE_URL : undefined),
      timeoutMs: s.timeoutMs,
      maxAttempts: s.maxAttempts,
      backoffBaseMs: s.backoffBaseMs,
      backoffJitterMs: s.backoffJitterMs,
      maxTokens: s.maxTokens,
      temperature: s.temperature,
      systemPrompt: s.systemPrompt,
    },
    cache: {
      driver: s.cacheDriver,
      url: s.cacheUrl ?? `http://${s.cacheHost}:${s.cachePort}`,
      token: s.cacheToken,
      ttlSeconds: s.cacheTtlSeconds,
      namespace: s.cacheNamespace,
    },
    orchestrator: {
      defaultModel: s.model,
      maxQueryLength: s.maxQueryLength,
      cacheTtlSeconds: s.cacheTtlSeconds,
      requestTimeoutMs: s.requestTimeoutMs ?? retryBudgetMs(s) + DEADLINE_GRACE_MS,
    },
    server: { host: s.host, port: s.port },
    logLevel: s.logLevel,
  };
}

/**
 * Copy of `config` that is safe to print: credentials are masked.
 */
export function redactConfig(config: ProxyConfig): ProxyConfig {
  const mask = (value: string | undefined) => (value ? '***' : undefined);
  return {
    ...config,
    inference: { ...config.inference, apiKey: mask(config.inference.apiKey) },
    cache: { ...config.cache, token: mask(config.cache.token) },
  };
}
