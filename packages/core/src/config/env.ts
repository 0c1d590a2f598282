import { SETTING_NAMES } from './settings.js';
import type { ProxySettings, SettingName } from './settings.js';

/**
 * Environment variable backing each setting.
 */
export const ENV_VARS: Record<SettingName, string> = {
  provider: 'INFERENCE_PROVIDER',
  baseUrl: 'BASE_URL',
  apiKey: 'API_KEY',
  model: 'MODEL_NAME',
  timeoutMs: 'INFERENCE_TIMEOUT_MS',
  maxAttempts: 'INFERENCE_MAX_ATTEMPTS',
  backoffBaseMs: 'INFERENCE_BACKOFF_BASE_MS',
  backoffJitterMs: 'INFERENCE_BACKOFF_JITTER_MS',
  maxTokens: 'INFERENCE_MAX_TOKENS',
  temperature: 'INFERENCE_TEMPERATURE',
  systemPrompt: 'INFERENCE_SYSTEM_PROMPT',
  cacheDriver: 'CACHE_DRIVER',
  cacheUrl: 'CACHE_URL',
  cacheHost: 'CACHE_HOST',
  cachePort: 'CACHE_PORT',
  cacheToken: 'CACHE_TOKEN',
  cacheTtlSeconds: 'CACHE_TTL_SECONDS',
  cacheNamespace: 'CACHE_NAMESPACE',
  host: 'HOST',
  port: 'PORT',
  maxQueryLength: 'MAX_QUERY_LENGTH',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
  logLevel: 'LOG_LEVEL',
};

/**
 * Read settings from environment variables. Blank values count as unset.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): ProxySettings {
  const settings: ProxySettings = {};
  for (const name of SETTING_NAMES) {
    const value = env[ENV_VARS[name]]?.trim();
    if (value) settings[name] = value;
  }
  return settings;
}
