import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // Ship one file: the workspace core package exposes TypeScript sources only
  noExternal: ['@dirsweep/core'],
});
