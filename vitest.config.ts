import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/run.ts'],
        },
    },
    resolve: {
        alias: {
            '@siteripper/capture': resolve('./packages/capture/src/index.ts'),
            '@siteripper/cli': resolve('./packages/cli/src/index.ts'),
            '@siteripper/http': resolve('./packages/http/src/index.ts'),
            '@siteripper/state': resolve('./packages/state/src/index.ts'),
            '@siteripper/types': resolve('./packages/types/src/index.ts'),
            '@siteripper/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
