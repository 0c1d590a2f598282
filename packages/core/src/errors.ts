/**
 * Base error type for failures raised by `@chatcache/core`.
 */
export class ChatCacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatCacheError';
  }
}

/**
 * Client input that can never succeed (empty query, oversized query, bad body).
 *
 * The message is safe to return to the caller.
 */
export class InvalidRequestError extends ChatCacheError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/**
 * The cache store could not be reached or rejected an operation.
 *
 * The chat path absorbs this error; only the `/cache/*` routes surface it.
 */
export class CacheUnavailableError extends ChatCacheError {
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Cache store unavailable during ${operation}`, options);
    this.name = 'CacheUnavailableError';
    this.operation = operation;
  }
}

/**
 * The overall per-request deadline elapsed before inference finished.
 */
export class RequestTimeoutError extends ChatCacheError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request did not complete within ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Configuration failed validation. `issues` lists one line per invalid setting.
 */
export class ConfigError extends ChatCacheError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
