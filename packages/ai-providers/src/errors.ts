/**
 * Base error type for failures coming from inference clients.
 *
 * This is used so callers can tell "provider problems" apart from cache or
 * validation errors. `retryable` drives the retry loop in `BaseInferenceClient`.
 */
export class InferenceError extends Error {
  readonly retryable: boolean;

  /** HTTP status returned by the provider, when there was one. */
  readonly status: number | undefined;

  constructor(message: string, options: { retryable: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'InferenceError';
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

/**
 * The provider rejected the configured credential (HTTP 401/403).
 *
 * The message never includes the credential or the provider's response body.
 */
export class InferenceAuthError extends InferenceError {
  constructor(status: number, options?: { cause?: unknown }) {
    super(`Inference provider rejected the credentials (HTTP ${status})`, {
      retryable: false,
      status,
      cause: options?.cause,
    });
    this.name = 'InferenceAuthError';
  }
}

/**
 * The provider rejected the request itself (other 4xx, e.g. an unknown model).
 */
export class InferenceRequestError extends InferenceError {
  constructor(status: number, options?: { cause?: unknown }) {
    super(`Inference provider rejected the request (HTTP ${status})`, {
      retryable: false,
      status,
      cause: options?.cause,
    });
    this.name = 'InferenceRequestError';
  }
}

/**
 * A failure worth retrying: network errors, 5xx, 408/409/429, empty completions.
 */
export class InferenceTransientError extends InferenceError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { retryable: true, status: options?.status, cause: options?.cause });
    this.name = 'InferenceTransientError';
  }
}

/**
 * Thrown when a single attempt exceeds the configured timeout.
 */
export class InferenceTimeoutError extends InferenceTransientError {
  constructor(timeoutMs: number) {
    super(`Inference request timed out after ${timeoutMs}ms`);
    this.name = 'InferenceTimeoutError';
  }
}

/**
 * Every attempt failed with a retryable error. `cause` holds the last one.
 */
export class InferenceUnavailableError extends InferenceError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super(`Inference provider unavailable after ${attempts} attempt(s)`, {
      retryable: false,
      cause: options?.cause,
    });
    this.name = 'InferenceUnavailableError';
    this.attempts = attempts;
  }
}

/**
 * The caller aborted the request (client disconnect or overall deadline).
 */
export class InferenceAbortedError extends InferenceError {
  constructor(options?: { cause?: unknown }) {
    super('Inference request was aborted', { retryable: false, cause: options?.cause });
    this.name = 'InferenceAbortedError';
  }
}

const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 429]);

/**
 * Map an HTTP status from the provider onto the error taxonomy.
 */
export function errorForStatus(status: number, options?: { cause?: unknown }): InferenceError {
  if (status === 401 || status === 403) return new InferenceAuthError(status, options);
  if (status >= 400 && status < 500 && !RETRYABLE_CLIENT_STATUSES.has(status)) {
    return new InferenceRequestError(status, options);
  }
  return new InferenceTransientError(`Inference provider returned HTTP ${status}`, {
    status,
    cause: options?.cause,
  });
}

function statusOf(error: unknown): number | undefined {
  if (error === null || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Normalize anything a provider call threw into an `InferenceError`.
 *
 * SDK errors carrying an HTTP `status` (openai's `APIError` family) are mapped
 * with `errorForStatus`. Anything without a status (connection resets, DNS
 * failures, SDK connection errors) is treated as transient.
 */
export function toInferenceError(error: unknown): InferenceError {
  if (error instanceof InferenceError) return error;

  const status = statusOf(error);
  if (status !== undefined) return errorForStatus(status, { cause: error });

  return new InferenceTransientError('Inference provider could not be reached', { cause: error });
}
