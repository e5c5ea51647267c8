import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['Shared/tests/**/*.test.ts', 'Client/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    sequence: {
      shuffle: false,
    },
  },
});
