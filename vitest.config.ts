import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup/vitest.base.setup.ts'],
    include: ['src/**/*.unit.test.ts', 'tests/**/*.int.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    hookTimeout: 10000,
    reporters: ['default'],
    pool: 'forks',
  },
});
