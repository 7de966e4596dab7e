import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'physics': resolveFromRoot('src/physics'),
            'render': resolveFromRoot('src/render'),
            'util': resolveFromRoot('src/util'),
            'cli': resolveFromRoot('src/cli'),
            'input': resolveFromRoot('src/input'),
            'storage': resolveFromRoot('src/storage'),
            'config': resolveFromRoot('src/config'),
        },
    },
    test: {
        environment: 'jsdom',
        include: ['tests/unit/**/*.spec.ts'],
        setupFiles: ['tests/setup/vitest.setup.ts'],
        clearMocks: true,
        restoreMocks: true,
    },
});
