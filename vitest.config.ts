import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        pool: 'forks',
        // e2e suites build on state from earlier tests in the same file
        sequence: { concurrent: false },
        env: {
            NODE_ENV: 'test',
            JWT_SECRET: 'test-secret-not-for-production',
            PROGRESS_STORE: 'memory',
        },
        include: ['tests/**/*.test.ts'],
    },
});
