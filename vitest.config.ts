import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // RSA-2048 key generation dominates test time
    testTimeout: 30000,
    coverage: {
      include: ['src/**/*.ts'],
    },
  },
});
