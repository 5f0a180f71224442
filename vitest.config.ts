import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    pool: 'threads',
    isolate: true,
    fileParallelism: true,
    sequence: {
      shuffle: true, // Detect order-dependent tests
    },
  },
})
