import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
    // PGlite boots a WASM Postgres per suite
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
