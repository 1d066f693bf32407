import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePackage = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@resmon/shared': resolvePackage('shared'),
      '@resmon/core': resolvePackage('core'),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
