import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // Encoding the full icon set through sharp takes a moment on cold runs.
        testTimeout: 30000,
    },
})
