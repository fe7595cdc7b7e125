import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        index: 'packages/cli/src/cli.ts',
    },
    outDir: 'dist',
    format: ['esm'],
    target: 'node20',
    platform: 'node',
    dts: false,
    clean: true,
    minify: false,
    sourcemap: false,
    splitting: false,
    bundle: true,
    banner: {
        js: '#!/usr/bin/env node',
    },
})
