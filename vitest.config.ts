import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['server/**/__tests__/**/*.test.ts', 'shared/**/__tests__/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
    },
});
