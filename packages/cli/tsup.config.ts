import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  // @runway/* workspaces export .ts sources
  noExternal: [/^@runway\//],
  banner: { js: '#!/usr/bin/env node' }
})
