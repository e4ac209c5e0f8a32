import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'cli',
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts', 'bin/**/*.test.ts', 'test/unit/**/*.test.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@kprint/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
