import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // sharp's native bindings are not safe to reload across worker threads
    pool: 'forks',
    testTimeout: 30000,
  },
});
