import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/src/**/*.test.ts', 'media/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: [
      {
        find: '@timeweave/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: '@timeweave/media',
        replacement: new URL('./media/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
