import { z } from 'zod';

import type { CachedChatEntry } from '../types/cache.js';

const cachedChatEntrySchema = z.object({
  text: z.string(),
  model: z.string(),
  createdAt: z.number(),
});

export function serializeEntry(entry: CachedChatEntry): string {
  return JSON.stringify(entry);
}

/**
 * Parse a stored entry. Anything that is not a well-formed entry yields `undefined`.
 */
export function parseEntry(raw: string): CachedChatEntry | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = cachedChatEntrySchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}
