import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // The config loader and logger keep per-process state.
    fileParallelism: false,
    pool: 'threads',
  },
});
