import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/server/src/cli.ts', 'packages/*/src/index.ts'],
        },
    },
    resolve: {
        alias: {
            '@json-echo/core': resolve('./packages/core/src/index.ts'),
            '@json-echo/server': resolve('./packages/server/src/index.ts'),
        },
    },
});
