import { describe, expect, it, vi } from 'vitest';

import { CacheUnavailableError } from '../errors.js';

import { createLogger, describeError, truncateForLog } from './logger.js';
import type { LogSink } from './logger.js';

function createSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

describe('createLogger', () => {
  it('prefixes lines with the scope and passes context through', () => {
    const sink = createSink();
    const logger = createLogger('chatcache', { sink });

    logger.info('listening', { port: 8000 });
    logger.warn('slow');

    expect(sink.info).toHaveBeenCalledWith('[chatcache] listening', { port: 8000 });
    expect(sink.warn).toHaveBeenCalledWith('[chatcache] slow');
  });

  it('drops entries below the configured level', () => {
    const sink = createSink();
    const logger = createLogger('chatcache', { level: 'warn', sink });

    logger.debug('a');
    logger.info('b');
    logger.error('c');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledWith('[chatcache] c');
  });

  it('nests child scopes and keeps the level', () => {
    const sink = createSink();
    const logger = createLogger('chatcache', { level: 'info', sink }).child('inference');

    logger.debug('hidden');
    logger.info('retrying');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('[chatcache:inference] retrying');
  });
});

describe('truncateForLog', () => {
  it('keeps short text and shortens long text', () => {
    expect(truncateForLog('short')).toBe('short');
    expect(truncateForLog('abcdefghij', 4)).toBe('abcd…');
  });
});

describe('describeError', () => {
  it('includes the cause of wrapped errors', () => {
    const error = new CacheUnavailableError('get', { cause: new Error('ECONNREFUSED') });
    expect(describeError(error)).toEqual({
      error: 'CacheUnavailableError',
      message: 'Cache store unavailable during get',
      cause: 'Error: ECONNREFUSED',
    });
  });

  it('stringifies non-errors', () => {
    expect(describeError('boom')).toEqual({ error: 'boom' });
  });
});
