import { afterEach, describe, expect, it, vi } from 'vitest';

import type { InferenceClientConfig, RetryState } from '@chatcache/core/types';
import { DEFAULT_SYSTEM_PROMPT } from '@chatcache/core';

import { BaseInferenceClient } from './base.js';
import type {
  InferenceClientOptions,
  ProviderCompletion,
  ProviderRequest,
  SleepFn,
} from './base.js';
import {
  InferenceAbortedError,
  InferenceAuthError,
  InferenceRequestError,
  InferenceTimeoutError,
  InferenceTransientError,
  InferenceUnavailableError,
} from './errors.js';

type Step = (signal: AbortSignal) => Promise<ProviderCompletion> | ProviderCompletion;

class ScriptedClient extends BaseInferenceClient {
  readonly requests: ProviderRequest[] = [];
  private readonly steps: Step[];

  constructor(
    steps: Step[],
    config: Partial<InferenceClientConfig> = {},
    options: InferenceClientOptions = {},
  ) {
    super({ provider: 'custom', model: 'test-model', ...config }, options);
    this.steps = steps;
  }

  protected async rawComplete(
    request: ProviderRequest,
    signal: AbortSignal,
  ): Promise<ProviderCompletion> {
    const step = this.steps[this.requests.length] ?? this.steps[this.steps.length - 1];
    this.requests.push(request);
    if (!step) throw new Error('no scripted step');
    return await step(signal);
  }

  async healthCheck(): Promise<void> {}
}

const ok =
  (text: string): Step =>
  () => ({ text });

const fail =
  (error: Error): Step =>
  () => {
    throw error;
  };

const hang: Step = () => new Promise<ProviderCompletion>(() => {});

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

function recordingSleep(delays: number[]): SleepFn {
  return async (ms) => {
    delays.push(ms);
  };
}

describe('BaseInferenceClient', () => {
  it('retries transient failures with exponential backoff and then succeeds', async () => {
    const delays: number[] = [];
    const client = new ScriptedClient(
      [fail(new Error('socket hang up')), fail(httpError(503)), ok('hello')],
      {},
      { sleep: recordingSleep(delays), random: () => 0 },
    );

    const result = await client.complete('hi', 'test-model');

    expect(result.text).toBe('hello');
    expect(result.attempts).toBe(3);
    expect(result.model).toBe('test-model');
    expect(delays).toEqual([500, 1000]);
  });

  it('gives up after maxAttempts with InferenceUnavailableError', async () => {
    const delays: number[] = [];
    const client = new ScriptedClient(
      [fail(httpError(502))],
      { maxAttempts: 3 },
      { sleep: recordingSleep(delays), random: () => 0 },
    );

    const error = await client.complete('hi', 'test-model').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    if (error instanceof InferenceUnavailableError) {
      expect(error.attempts).toBe(3);
      expect(error.message).toBe('Inference provider unavailable after 3 attempt(s)');
      expect(error.cause).toBeInstanceOf(InferenceTransientError);
    }
    expect(client.requests).toHaveLength(3);
    expect(delays).toEqual([500, 1000]);
  });

  it('does not retry rejected credentials', async () => {
    const delays: number[] = [];
    const client = new ScriptedClient(
      [fail(httpError(401))],
      {},
      { sleep: recordingSleep(delays) },
    );

    await expect(client.complete('hi', 'test-model')).rejects.toBeInstanceOf(InferenceAuthError);
    expect(client.requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('does not retry rejected requests', async () => {
    const client = new ScriptedClient([fail(httpError(404))], {}, { sleep: recordingSleep([]) });

    await expect(client.complete('hi', 'unknown-model')).rejects.toBeInstanceOf(
      InferenceRequestError,
    );
    expect(client.requests).toHaveLength(1);
  });

  it('retries an empty completion', async () => {
    const client = new ScriptedClient(
      [ok('   '), ok('second try')],
      {},
      { sleep: recordingSleep([]) },
    );

    const result = await client.complete('hi', 'test-model');

    expect(result.text).toBe('second try');
    expect(result.attempts).toBe(2);
  });

  it('adds jitter scaled by the random source', () => {
    const client = new ScriptedClient(
      [],
      { backoffBaseMs: 200, backoffJitterMs: 100 },
      { random: () => 0.5 },
    );

    expect(client.backoffDelayMs(2)).toBe(250);
    expect(client.backoffDelayMs(3)).toBe(450);
    expect(client.backoffDelayMs(4)).toBe(850);
  });

  it('reports each retry through onRetry', async () => {
    const retries: RetryState[] = [];
    const client = new ScriptedClient(
      [fail(httpError(429)), ok('done')],
      {},
      { sleep: recordingSleep([]), random: () => 0, onRetry: (state) => retries.push(state) },
    );

    await client.complete('hi', 'test-model');

    expect(retries).toHaveLength(1);
    expect(retries[0]).toMatchObject({ attempt: 1, maxAttempts: 3, delayMs: 500 });
    expect(retries[0]?.lastError).toBeInstanceOf(InferenceTransientError);
  });

  it('times out a stuck attempt and counts it as transient', async () => {
    const client = new ScriptedClient(
      [hang],
      { timeoutMs: 20, maxAttempts: 2 },
      { sleep: recordingSleep([]) },
    );

    const error = await client.complete('hi', 'test-model').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    if (error instanceof InferenceUnavailableError) {
      expect(error.cause).toBeInstanceOf(InferenceTimeoutError);
    }
    expect(client.requests).toHaveLength(2);
  });

  it('stops when the caller aborts mid-attempt', async () => {
    const signals: AbortSignal[] = [];
    const client = new ScriptedClient(
      [
        (signal) => {
          signals.push(signal);
          return hang(signal);
        },
      ],
      {},
      { sleep: recordingSleep([]) },
    );
    const controller = new AbortController();

    const pending = client.complete('hi', 'test-model', {}, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(InferenceAbortedError);
    expect(client.requests).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it('does not call the provider when already aborted', async () => {
    const client = new ScriptedClient([ok('never')]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.complete('hi', 'test-model', {}, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(InferenceAbortedError);
    expect(client.requests).toHaveLength(0);
  });

  it('fills generation params from config defaults', async () => {
    const client = new ScriptedClient([ok('x')], { temperature: 0.2 });

    await client.complete('hi', 'test-model', { maxTokens: 32 });

    expect(client.requests[0]?.params).toEqual({
      maxTokens: 32,
      temperature: 0.2,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
    });
  });
});

describe('BaseInferenceClient backoff waits', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function onFirstRetry(): { options: InferenceClientOptions; waiting: Promise<void> } {
    let signalRetry = (): void => {};
    const waiting = new Promise<void>((resolve) => {
      signalRetry = resolve;
    });
    return { options: { random: () => 0, onRetry: () => signalRetry() }, waiting };
  }

  it('waits on a timer without holding up other calls', async () => {
    vi.useFakeTimers();
    const { options, waiting } = onFirstRetry();
    const client = new ScriptedClient(
      [fail(httpError(503)), ok('second call'), ok('recovered')],
      {},
      options,
    );

    let settled = false;
    const first = client.complete('first', 'test-model').finally(() => {
      settled = true;
    });
    await waiting;

    const second = await client.complete('second', 'test-model');
    expect(second.text).toBe('second call');
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(499);
    expect(settled).toBe(false);
    expect(client.requests).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(1);
    const result = await first;
    expect(result.text).toBe('recovered');
    expect(result.attempts).toBe(2);
    expect(client.requests.map((request) => request.query)).toEqual(['first', 'second', 'first']);
  });

  it('ends the wait as soon as the caller aborts', async () => {
    vi.useFakeTimers();
    const { options, waiting } = onFirstRetry();
    const client = new ScriptedClient([fail(httpError(503)), ok('too late')], {}, options);
    const controller = new AbortController();

    const pending = client.complete('hi', 'test-model', {}, { signal: controller.signal });
    await waiting;
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(InferenceAbortedError);
    expect(client.requests).toHaveLength(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
