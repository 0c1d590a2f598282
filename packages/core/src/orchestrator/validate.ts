import { InvalidRequestError } from '../errors.js';

const MAX_MODEL_LENGTH = 200;

/**
 * Trim and bound-check a user query. Returns the trimmed query.
 */
export function validateQuery(query: string, maxLength: number): string {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new InvalidRequestError('Query cannot be empty');
  }
  if (trimmed.length > maxLength) {
    throw new InvalidRequestError(`Query exceeds the maximum length of ${maxLength} characters`);
  }
  return trimmed;
}

/**
 * Resolve the model for a request: the caller's choice when given, else the default.
 */
export function resolveModel(model: string | undefined, defaultModel: string): string {
  if (model === undefined) return defaultModel;
  const trimmed = model.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_MODEL_LENGTH) {
    throw new InvalidRequestError(`Model must be between 1 and ${MAX_MODEL_LENGTH} characters`);
  }
  return trimmed;
}
