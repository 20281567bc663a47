import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['js/*/tests/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        pool: 'threads',
        poolOptions: {
            threads: {
                singleThread: true,
            },
        },
        testTimeout: 30000,
    },
});
