/**
 * Types-only entrypoint.
 *
 * Packages that only need shared types (such as `@chatcache/ai-providers`)
 * should import from `@chatcache/core/types`.
 */
export * from './types/index.js';
