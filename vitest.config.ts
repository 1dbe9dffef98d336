import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.bench.ts', '**/*.test.ts', '**/index.ts', '**/types.ts'],
    },
    benchmark: {
      include: ['packages/*/test/**/*.bench.ts'],
    },
  },
});
