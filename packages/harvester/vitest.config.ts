/**
 * Vitest Configuration for geo-harvest
 *
 * SCOPE: Unit tests with every network dependency replaced by in-process fakes
 *
 * USAGE: npm test
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'harvester',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    environment: 'node',
    testTimeout: 10_000,
    hookTimeout: 5_000,
    pool: 'forks',
    globals: true,
    retry: 0,
  },
});
