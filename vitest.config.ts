import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        setupFiles: ['./vitest.setup.ts'],
    },
    plugins: [tsconfigPaths()],
})
