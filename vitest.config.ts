import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['registry-transport/typescript/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['**/__tests__/**', 'dist/**', 'node_modules/**'],
    },
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
  },
});
