import { defineConfig } from 'tsup';

// Build configuration for the cokacenc CLI
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  minify: false,
  banner: {
    js: '#!/usr/bin/env node',
  },
  target: 'node20',
  splitting: false,
});
