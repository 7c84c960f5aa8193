import { defineConfig } from 'tsup';

const isProduction = process.env.NODE_ENV === 'production';

export default defineConfig({
  entry: ['src/index.ts'],
  // ESM only: the installer template is located through import.meta.url
  format: ['esm'],
  dts: true,
  sourcemap: !isProduction,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  target: 'node20',
  minify: isProduction,
});
