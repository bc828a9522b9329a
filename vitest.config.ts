import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'etl/src/**/*.test.ts'],
    passWithNoTests: false,
  },
})
