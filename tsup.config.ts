import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    cli: 'src/cli/index.ts', // CLI entry -> dist/cli.js
    index: 'src/index.ts', // Library entry -> dist/index.js
  },

  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',

  // Makes dist/cli.js directly executable
  banner: {
    js: '#!/usr/bin/env node',
  },

  noExternal: [],

  // Native bindings and optional libraries stay outside the bundle
  external: [
    'commander',
    'chalk',
    'ora',
    'zod',
    'tree-sitter',
    'tree-sitter-python',
    'docx',
  ],
});
