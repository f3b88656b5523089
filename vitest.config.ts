import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        env: {
            NODE_ENV: 'test'
        },
        testTimeout: 30000,
        hookTimeout: 30000,
        pool: 'forks',
    },
});
