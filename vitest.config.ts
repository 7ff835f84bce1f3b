import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/tests/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 30000,
    },
});
