import { defineConfig } from 'tsup';

export default defineConfig([
  // CLI executable
  {
    entry: {
      'bin/cli': 'src/cli/index.ts',
    },
    format: ['cjs'],
    target: 'node20',
    platform: 'node',
    clean: true,
    dts: false,
    sourcemap: true,
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
  // Main library
  {
    entry: {
      index: 'src/index.ts',
    },
    format: ['cjs'],
    target: 'node20',
    platform: 'node',
    dts: true,
    sourcemap: true,
    splitting: false,
  },
]);
