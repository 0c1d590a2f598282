import {
  CacheUnavailableError,
  InvalidRequestError,
  RequestTimeoutError,
  describeError,
} from '@chatcache/core';
import type { Logger } from '@chatcache/core';
import {
  InferenceAbortedError,
  InferenceAuthError,
  InferenceRequestError,
  InferenceUnavailableError,
} from '@chatcache/ai-providers';

import { json } from './respond.js';

/** Non-standard status used by proxies when the client closed the connection. */
export const CLIENT_CLOSED_REQUEST = 499;

/**
 * Translate a thrown error into a client-safe JSON response.
 *
 * Only `InvalidRequestError` messages reach the client verbatim; every other
 * body is a fixed string. Details (including causes) go to the log.
 */
export function toErrorResponse(error: unknown, logger: Logger): Response {
  if (error instanceof InvalidRequestError) {
    return json({ error: error.message }, 400);
  }

  if (error instanceof InferenceAuthError) {
    logger.error('inference provider rejected the configured credentials', describeError(error));
    return json({ error: 'The model provider rejected the proxy credentials' }, 502);
  }

  if (error instanceof InferenceRequestError) {
    logger.warn('inference provider rejected the request', describeError(error));
    return json({ error: 'The model provider rejected the request' }, 400);
  }

  if (error instanceof InferenceUnavailableError) {
    logger.error('inference provider unavailable', describeError(error));
    return json({ error: 'The model provider is temporarily unavailable' }, 503);
  }

  if (error instanceof RequestTimeoutError) {
    logger.warn('request deadline exceeded', describeError(error));
    return json({ error: 'The model provider did not respond in time' }, 504);
  }

  if (error instanceof InferenceAbortedError) {
    logger.info('request aborted by client');
    return json({ error: 'Request aborted' }, CLIENT_CLOSED_REQUEST);
  }

  if (error instanceof CacheUnavailableError) {
    logger.error('cache store unavailable', describeError(error));
    return json({ error: 'Cache store unavailable' }, 503);
  }

  logger.error('unhandled error', describeError(error));
  return json({ error: 'Internal server error' }, 500);
}
