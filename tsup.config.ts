import { defineConfig, type Options } from 'tsup';

const shared = {
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  sourcemap: true,
} satisfies Options;

export const cliBuild: Options = {
  ...shared,
  entry: ['src/index.ts'],
  banner: {
    js: '#!/usr/bin/env node',
  },
};

export const libraryBuild: Options = {
  ...shared,
  entry: ['src/api.ts'],
  dts: true,
};

export default defineConfig([cliBuild, libraryBuild]);
