/**
 * Vitest Configuration
 *
 * Tests live under tests/ and import sources directly from src/,
 * so no build is needed before a run.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'decla',
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli-exec.ts'],
    },
  },
});
