import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@consultflow/core': fromRoot('./packages/core/src/index.ts'),
      '@consultflow/adapters': fromRoot('./packages/adapters/src/index.ts'),
      '@': fromRoot('./apps/consultflow'),
    },
  },
  test: {
    environment: 'node',
    include: ['apps/consultflow/tests/**/*.test.ts'],
  },
})
