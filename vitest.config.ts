import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for Veritas
 *
 * Unit tests only: verification is pure and in-process, so every test file
 * runs in the default fork pool without setup files.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
      ],
    },
  },
});
