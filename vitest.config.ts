import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Probe and readiness tests talk to in-process servers on loopback
    testTimeout: 15_000,
  },
});
