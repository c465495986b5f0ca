import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: false,
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      'loom-core': fileURLToPath(new URL('./packages/loom-core/src/index.ts', import.meta.url)),
    },
  },
});
