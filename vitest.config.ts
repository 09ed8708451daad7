import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    silent: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/test/**',
        // Type-only contracts have no runtime to execute.
        'packages/core/src/types/**/*.ts',
        'packages/core/src/stores/cache-store.ts',
      ],
    },
  },
});
