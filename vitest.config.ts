/**
 * Vitest Configuration for docspec
 *
 * Unit tests live under tests/unit and import sources relatively.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,

    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    include: ['tests/**/*.test.ts'],

    // Setup
    setupFiles: ['tests/setup.ts'],

    testTimeout: 10000,

    // Coverage configuration (npm run test:coverage)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/index.ts', // Re-export files
      ],
      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
    },
  },
})
