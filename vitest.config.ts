import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string): string =>
    fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            // Workspace packages resolve to their sources so tests need no build
            {
                find: /^@stagefile\/core\/test-utils$/,
                replacement: fromRoot('./packages/core/src/logger/test-utils.ts'),
            },
            {
                find: /^@stagefile\/core$/,
                replacement: fromRoot('./packages/core/src/index.ts'),
            },
        ],
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
    },
});
