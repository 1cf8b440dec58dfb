import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['testbed/tests/**/*.test.ts'],
    testTimeout: 10000,
    pool: 'forks',
  },
});
