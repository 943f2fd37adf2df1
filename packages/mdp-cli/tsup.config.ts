import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    bin: 'src/bin.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  dts: false, // workspace packages export TypeScript sources directly
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  // Inline workspace packages
  noExternal: [/^@bellman\//],
  external: ['zod', 'yaml'],
});
