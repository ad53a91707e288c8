import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['aws/**/typescript/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
