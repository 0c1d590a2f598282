import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source across every workspace package.
 *
 * Workspace imports are aliased to their source entrypoints so tests never
 * depend on a prior build or on how npm linked the workspaces.
 */
export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@chatcache/core/testing',
        replacement: path.join(repoRoot, 'packages/core/src/testing/index.ts'),
      },
      {
        find: '@chatcache/core/types',
        replacement: path.join(repoRoot, 'packages/core/src/types-entry.ts'),
      },
      { find: '@chatcache/core', replacement: path.join(repoRoot, 'packages/core/src/index.ts') },
      {
        find: '@chatcache/ai-providers',
        replacement: path.join(repoRoot, 'packages/ai-providers/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/**/src/**/*.test.ts'],
  },
});
