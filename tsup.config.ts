import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm', 'cjs'],
  target: 'node20',
  outDir: 'dist-bundle',
  sourcemap: true,
  dts: false,
  clean: true,
  minify: false,
  splitting: false,
  shims: false
});
