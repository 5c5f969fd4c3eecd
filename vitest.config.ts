import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (name: string): string =>
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@scholar/core': workspace('core'),
            '@scholar/engine': workspace('engine'),
            '@scholar/adapters': workspace('adapters'),
            '@scholar/research': workspace('research'),
            '@scholar/testing': workspace('testing')
        }
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node'
    }
});
