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
      reporter: ['text', 'lcov'],
      include: ['src/solver/**', 'src/app/**', 'src/cli/**'],
      exclude: ['**/__tests__/**', '**/*.test.*', 'src/cli/index.ts', 'src/cli/repl.ts'],
      thresholds: {
        statements: 90,
        branches: 75,
        functions: 90,
        lines: 90,
      },
    },
    include: ['src/**/*.test.ts'],
    globals: true,
  },
})
