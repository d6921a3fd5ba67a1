import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'film-locations-query': fileURLToPath(new URL('../src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'app',
    root: fileURLToPath(new URL('.', import.meta.url)),
    include: ['src/**/*.unit.test.ts', 'tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    testTimeout: 10000,
  },
});
