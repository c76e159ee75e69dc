import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'integration-tests/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      FORCE_COLOR: '0',
    },
  },
})
