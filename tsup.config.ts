import { defineConfig } from 'tsup'

/**
 * tsup configuration for the omnikin library
 *
 * - splitting: shared code goes to chunks instead of being duplicated per entry
 * - cjs + esm with declarations
 */
export default defineConfig({
    name: 'omnikin',

    entry: {
        // ==================== Main Entries ====================
        // Default entry (includes all modules, suitable for Node.js)
        index: 'index.ts',

        // Explicit Node.js entry (full functionality)
        node: 'node.ts',

        // Browser-safe entry (excludes the terminal demo)
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/extras': 'src/extras/index.ts',
        'src/tasks': 'src/tasks/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime, never bundled
    external: [
        'readline',
    ],

    outDir: 'dist',
    target: 'es2020',

    platform: 'neutral',
})
