import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'taxi-tracker',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        setupFiles: ['src/__tests__/setup.ts'],
        testTimeout: 5_000,
        pool: 'forks',
        globals: true,
        environment: 'node',
        // Tests never reach the network; fetch is stubbed per test
        restoreMocks: true,
        unstubGlobals: true,
        unstubEnvs: true,
    },
});
