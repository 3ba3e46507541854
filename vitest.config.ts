import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['modules/**/tests/**/*.test.ts'],
        environment: 'node',
        restoreMocks: true,
    },
});
