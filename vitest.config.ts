/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the cache hierarchy simulator.
 */

import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    setupFiles: ['./tests/setup.ts'],

    testTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/index.ts', 'tests/**/*.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    pool: 'threads',

    clearMocks: true,
    restoreMocks: true,
  },

  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },

  esbuild: {
    target: 'node20',
  },
});
