import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // Keep the JSON logger quiet while tests run
    env: {
      NODE_ENV: 'test'
    },
    testTimeout: 20000
  }
});
