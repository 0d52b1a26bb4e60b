/// <reference types="vitest/config" />
/**
 * Root Vitest: one node project covering every workspace package.
 * Packages carry no vitest.config.ts of their own.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const Dirname = path.dirname(fileURLToPath(import.meta.url));

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    cacheDir: 'node_modules/.vitest',
    output: {
        chaiConfig: { includeStack: true, showDiff: true, truncateThreshold: 0 },
        diff: { expand: true, truncateThreshold: 0 },
    },
    patterns: {
        coverageExclude: ['**/*.config.*', '**/*.d.ts', '**/node_modules/**', '**/tests/**', 'packages/test-utils/**'],
        coverageInclude: ['packages/**/src/**/*.ts'],
        testExclude: ['**/node_modules/**', '**/dist/**'],
        testInclude: ['packages/*/tests/**/*.spec.ts'],
    },
    setupFiles: [path.resolve(Dirname, 'packages/test-utils/src/setup.ts')],
    timeouts: { hook: 10_000, slow: 5_000, test: 10_000 },
} as const);

// --- [EXPORT] ----------------------------------------------------------------

export default defineConfig({
    cacheDir: B.cacheDir,
    test: {
        chaiConfig: { ...B.output.chaiConfig },
        clearMocks: true,
        coverage: {
            clean: true,
            enabled: false,
            exclude: [...B.patterns.coverageExclude],
            include: [...B.patterns.coverageInclude],
            provider: 'v8',
            reportsDirectory: path.resolve(Dirname, 'coverage'),
            thresholds: { branches: 80, functions: 80, lines: 80, statements: 80 },
        },
        diff: { ...B.output.diff },
        environment: 'node',
        exclude: [...B.patterns.testExclude],
        globals: true,
        hookTimeout: B.timeouts.hook,
        include: [...B.patterns.testInclude],
        isolate: true,
        name: 'packages-node',
        passWithNoTests: false,
        pool: 'threads',
        restoreMocks: true,
        root: Dirname,
        sequence: { concurrent: false, hooks: 'stack', shuffle: false },
        setupFiles: [...B.setupFiles],
        slowTestThreshold: B.timeouts.slow,
        testTimeout: B.timeouts.test,
    },
});

export { B as VITEST_TUNING };
