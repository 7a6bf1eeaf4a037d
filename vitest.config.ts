import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: ['packages/*/src/**/*.test.ts'],
    silent: true,
    testTimeout: 2000,
    restoreMocks: true,
  },
});
