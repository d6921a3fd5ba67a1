import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'integration',
          // In-process only: the GeoJSON fixture stands in for the production dataset.
          include: ['tests/integration/**/*.test.ts'],
          testTimeout: 30000,
        },
      },
      'locations-app/vitest.config.ts',
    ],
  },
});
