import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@queueline/shared': fileURLToPath(new URL('../../shared/src', import.meta.url)),
      '@queueline/db': fileURLToPath(new URL('../../db/src', import.meta.url)),
      '@queueline/core': fileURLToPath(new URL('../../core/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    globals: true,
    testTimeout: 20_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
    },
  },
});
