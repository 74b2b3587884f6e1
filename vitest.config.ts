import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'integration-tests/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
})
