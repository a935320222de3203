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
          name: 'people-app',
          include: ['people-app/tests/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
