import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const here = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    root: here('.'),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@privative/core': here('../core/src/index.ts'),
      '@privative/features': here('./src/index.ts'),
    },
  },
});
