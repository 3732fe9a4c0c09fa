import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    globals: true,
    setupFiles: ['./src/__tests__/setup/unit.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
})
