/**
 * Public type exports for `@chatcache/core`.
 *
 * Keep this file as the single place to export types so consumers can import
 * from `@chatcache/core` without reaching into internal paths.
 */
export * from './cache.js';
export * from './chat.js';
export * from './config.js';
export * from './inference.js';
export * from './logger.js';
