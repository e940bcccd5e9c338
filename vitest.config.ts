import { defineConfig } from 'vitest/config'
import { fileURLToPath, URL } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage',
      reporter: ['text', 'lcov', 'html'],
      // Core coverage scope: solver + game state machine
      include: ['src/solver/**', 'src/game/**'],
      exclude: ['**/__tests__/**', '**/*.test.*'],
    },
    include: ['src/**/*.test.ts'],
    globals: true,
  },
})
