import { defineConfig } from 'tsup'

/**
 * tsup configuration for rrtkit
 *
 * - index: browser-safe entry (no fs)
 * - node: index + JsonlLogger
 */
export default defineConfig({
    name: 'rrtkit',

    entry: {
        index: 'index.ts',
        node: 'node.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime, never bundled
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist',
    target: 'es2020',

    platform: 'neutral',
})
