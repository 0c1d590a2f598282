import type { KeyValueStore } from '../cache/store.js';
import type {
  CompleteOptions,
  GenerationParams,
  InferenceClient,
  InferenceResult,
} from '../types/inference.js';

/**
 * In-process stand-in for a Redis store.
 *
 * Flip `down` to make every command fail the way an unreachable store would.
 * Only trailing-`*` patterns are supported by `scan`.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  down = false;
  private readonly entries = new Map<string, { value: string; ttlSeconds: number }>();

  /** Seed a key directly, bypassing the adapter under test. */
  seed(key: string, value: string, ttlSeconds = 60): void {
    this.entries.set(key, { value, ttlSeconds });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  ttlOf(key: string): number | undefined {
    return this.entries.get(key)?.ttlSeconds;
  }

  async get(key: string): Promise<string | null> {
    this.assertUp();
    return this.entries.get(key)?.value ?? null;
  }

  async setEx(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUp();
    this.entries.set(key, { value, ttlSeconds });
  }

  async del(keys: string[]): Promise<number> {
    this.assertUp();
    return keys.filter((key) => this.entries.delete(key)).length;
  }

  async scan(
    cursor: string,
    match: string,
    count: number,
  ): Promise<{ cursor: string; keys: string[] }> {
    this.assertUp();
    const prefix = match.endsWith('*') ? match.slice(0, -1) : match;
    const matching = [...this.entries.keys()].filter((key) =>
      match.endsWith('*') ? key.startsWith(prefix) : key === match,
    );
    const start = Number(cursor);
    const end = start + count;
    return { cursor: end >= matching.length ? '0' : String(end), keys: matching.slice(start, end) };
  }

  async ping(): Promise<void> {
    this.assertUp();
  }

  private assertUp(): void {
    if (this.down) throw new Error('connect ECONNREFUSED 127.0.0.1:8079');
  }
}

type Responder = (
  query: string,
  model: string,
  signal: AbortSignal | undefined,
) => Promise<string> | string;

/**
 * Scripted inference client that records every call.
 */
export class FakeInferenceClient implements InferenceClient {
  readonly calls: Array<{
    query: string;
    model: string;
    params: GenerationParams | undefined;
  }> = [];
  healthy = true;
  private readonly respond: Responder;

  constructor(respond: Responder = (query, model) => `Answer from ${model}: ${query}`) {
    this.respond = respond;
  }

  async complete(
    query: string,
    model: string,
    params?: GenerationParams,
    options: CompleteOptions = {},
  ): Promise<InferenceResult> {
    this.calls.push({ query, model, params });
    const text = await this.respond(query, model, options.signal);
    return { text, model, attempts: 1, latencyMs: 0 };
  }

  async healthCheck(): Promise<void> {
    if (!this.healthy) throw new Error('provider unreachable');
  }
}

/**
 * A pending task that only settles by rejecting with the signal's reason.
 */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
