import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'geoshift',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 5_000,
        globals: true,
        environment: 'node',
    },
});
