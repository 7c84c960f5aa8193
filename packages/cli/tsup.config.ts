import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';

const pkg = JSON.parse(readFileSync('./package.json', 'utf-8'));
const isProduction = process.env.NODE_ENV === 'production';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: !isProduction,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  target: 'node20',
  minify: isProduction,
  // The core package ships its installer template beside its own bundle
  external: ['@chirp-build/core'],
  define: {
    'process.env.CLI_VERSION': JSON.stringify(pkg.version),
  },
});
