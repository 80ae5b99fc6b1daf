import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const sharedEntry = fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url));
const daemonEntry = fileURLToPath(new URL('./packages/daemon/src/index.ts', import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@parley/shared': sharedEntry,
            '@parley/daemon': daemonEntry,
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['dist/**', 'node_modules/**'],
        server: {
            deps: {
                inline: ['@parley/shared', '@parley/daemon'],
            },
        },
    },
});
