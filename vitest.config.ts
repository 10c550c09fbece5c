import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Global test timeout (30 seconds for integration tests)
    testTimeout: 30000,

    // Setup file to run before tests
    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist', 'cache', 'output'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts'],
    },
  },
});
