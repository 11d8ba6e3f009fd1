/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],

    // Explicit imports from 'vitest'
    globals: false,

    // better-sqlite3 is loaded per worker
    pool: 'forks',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'coverage/**',
        'dist/**',
        '**/*.d.ts',
        'test/**',
        '**/*.test.ts',
        '**/{vitest,tsup,build}.config.*',
        'src/constants.ts',
        'src/index.ts',
      ],
    },

    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,
    isolate: true,

    // tsc runs separately
    typecheck: {
      enabled: false,
    },
  },
});
