import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  treeshake: true,
  target: 'es2022',
  // workspace packages ship TypeScript sources, so they are bundled
  noExternal: [/^@rulesmith\//],
  external: ['commander', 'colorette', 'dotenv', 'picomatch', 'zod', 'yaml', 'ajv', 'openai'],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
