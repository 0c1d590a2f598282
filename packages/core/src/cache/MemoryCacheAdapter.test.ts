import { describe, expect, it } from 'vitest';

import { MemoryCacheAdapter } from './MemoryCacheAdapter.js';

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('MemoryCacheAdapter', () => {
  it('counts hits and misses', async () => {
    const cache = new MemoryCacheAdapter();

    expect(await cache.get('a')).toBeUndefined();
    await cache.set('a', 'value', 600);
    expect(await cache.get('a')).toBe('value');

    expect(await cache.stats()).toEqual({ hits: 1, misses: 1, keys: 1, hitRate: 0.5 });
  });

  it('expires entries once the ttl has elapsed', async () => {
    const clock = createClock();
    const cache = new MemoryCacheAdapter({ now: clock.now });

    await cache.set('a', 'value', 10);
    clock.advance(9_999);
    expect(await cache.get('a')).toBe('value');

    clock.advance(1);
    expect(await cache.get('a')).toBeUndefined();
    expect((await cache.stats()).keys).toBe(0);
  });

  it('refreshes the ttl when a key is overwritten', async () => {
    const clock = createClock();
    const cache = new MemoryCacheAdapter({ now: clock.now });

    await cache.set('a', 'first', 10);
    clock.advance(8_000);
    await cache.set('a', 'second', 10);
    clock.advance(8_000);

    expect(await cache.get('a')).toBe('second');
  });

  it('deletes single entries', async () => {
    const cache = new MemoryCacheAdapter();
    await cache.set('a', 'value', 60);

    expect(await cache.delete('a')).toBe(true);
    expect(await cache.delete('a')).toBe(false);
    expect(await cache.get('a')).toBeUndefined();
  });

  it('clears everything and reports only live entries as removed', async () => {
    const clock = createClock();
    const cache = new MemoryCacheAdapter({ now: clock.now });

    await cache.set('short', 'x', 1);
    await cache.set('long-1', 'x', 600);
    await cache.set('long-2', 'x', 600);
    clock.advance(2_000);

    expect(await cache.clearAll()).toBe(2);
    expect((await cache.stats()).keys).toBe(0);
    expect(await cache.get('long-1')).toBeUndefined();
  });
});
