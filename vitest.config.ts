import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['plugins/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
