import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    globals: false,
    environment: 'node',
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
