import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // All dependencies should be external for CLI tool
    '@lezer/common',
    '@lezer/python',
    'chalk',
    'commander',
    'fast-glob',
    'micromatch',
    'strip-ansi',
    'zod'
  ]
});
