import { defineConfig } from 'vitest/config';
import path from 'node:path';

const ROOT = process.cwd();

export default defineConfig({
    root: ROOT,
    test: {
        root: ROOT,
        dir: path.resolve(ROOT, 'test'),
        include: ['**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        watch: false,
        reporters: 'default',
        environment: 'node',
        pool: 'forks',
        setupFiles: [path.resolve(ROOT, 'test/setup/tests.setup.ts')],
    },
});
