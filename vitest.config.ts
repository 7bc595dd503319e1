import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    env: {
      VAULT_CLERK_LOG_LEVEL: 'silent',
    },
  },
})
