import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['engine/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['engine/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts', 'engine/harness/cli.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
