import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    testTimeout: 30_000, // trial batches over 10k-bit streams
    include: ['src/__tests__/**/*.test.ts'],
    env: { LOG_LEVEL: 'silent' },
  },
})
