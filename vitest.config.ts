import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/**/__tests__/**/*.test.ts', 'shared/**/__tests__/**/*.test.ts'],
    testTimeout: 15000,
    pool: 'forks',
    disableConsoleIntercept: true,
  },
})
