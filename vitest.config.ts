/**
 * Vitest configuration for lexibloom
 *
 * Unit tests live under tests/unit, the end-to-end scenario under tests/e2e;
 * both run in Node. The word-list preset allocates 512 KiB per set, so forks
 * are capped to keep memory modest.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 4,
        minForks: 1,
      },
    },
    sequence: {
      shuffle: false,
    },
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
    },
  },
})
