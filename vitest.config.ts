import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Disable watch mode by default - prevents hanging in CI/automated runs
    watch: false,

    testTimeout: 30000,
    hookTimeout: 10000,

    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true
      }
    },

    clearMocks: true,
    restoreMocks: true,

    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', '.git'],
    setupFiles: ['tests/setup.ts'],

    environment: 'node',
    globals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
    }
  }
})
