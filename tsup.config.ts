import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'cli/index.ts' },
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  sourcemap: true,
});
