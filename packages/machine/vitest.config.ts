import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Use globals (describe, it, expect) without importing
    globals: true,

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/cli/bin.ts', '**/*.d.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
  },
});
