import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests mutate process.env.HOME and EXEPACK_* variables.
    // Keep files serial so they don't observe each other's environment.
    fileParallelism: false,
    pool: 'threads',
    testTimeout: 30_000,
  },
});
