import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    // Stubbed fetch never leaks between tests
    unstubGlobals: true,
  },
});
