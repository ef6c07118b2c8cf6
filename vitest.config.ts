import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            'wordcount-core': path.resolve(__dirname, 'packages/wordcount-core/src/index.ts')
        }
    },
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        testTimeout: 30000,
        hookTimeout: 30000
    }
});
