import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['spec/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 10_000,
  },
});
