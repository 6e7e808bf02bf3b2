import { defineConfig } from 'vitest/config';

// Unit, dal and e2e suites all run in-process (in-memory stores, cache and queue).
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
