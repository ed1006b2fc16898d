import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // tree-sitter is a native addon
    pool: 'forks',
    testTimeout: 10000,
  },
});
