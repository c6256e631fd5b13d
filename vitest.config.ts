import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 30_000,
    fileParallelism: false,
    clearMocks: true,
    env: { NO_COLOR: '1', FORCE_COLOR: '' },
  },
});
