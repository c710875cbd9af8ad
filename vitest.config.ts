import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        setupFiles: ['tests/utils/setup.ts'],
        environment: 'node',
        testTimeout: 20000,
    },
});
