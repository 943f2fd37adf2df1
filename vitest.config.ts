import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    passWithNoTests: false,
  },
  resolve: {
    extensions: ['.ts', '.js', '.mts', '.mjs'],
    alias: {
      '@bellman/mdp-contracts': source('mdp-contracts'),
      '@bellman/mdp-core': source('mdp-core'),
    },
  },
});
