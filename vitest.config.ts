/**
 * Vitest Configuration for geogrid
 *
 * Runs every unit test under tests/unit once. The grid is pure in-memory
 * code, so files run in parallel forks with isolated module state (the
 * global logger is module state).
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,

    pool: 'forks',
    poolOptions: {
      forks: {
        isolate: true,
      },
    },
    fileParallelism: true,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    include: ['tests/**/*.test.ts'],

    // Setup
    setupFiles: ['tests/setup.ts'],

    testTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
})
