import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Set NODE_ENV for test detection
    env: {
      NODE_ENV: 'test',
    },

    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Enable global APIs like describe, it, expect
    globals: true,

    testTimeout: 10000,
    retry: 0,
    reporters: ['default'],
  },
});
