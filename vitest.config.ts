/**
 * Vitest configuration for verbforms
 *
 * Unit tests live under tests/unit, end-to-end pipeline runs (real temp
 * directories, in-process dumps) under tests/e2e.
 */

import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
      '@tests': fileURLToPath(new URL('./tests', import.meta.url)),
    },
  },
  test: {
    globals: true,
    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30000,
  },
})
