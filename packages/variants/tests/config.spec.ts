/**
 * Validate configuration decoding and layering.
 */
import { it } from '@fast-check/vitest';
import { Schema as S } from 'effect';
import fc from 'fast-check';
import { describe, expect } from 'vitest';
import { CONFIG_TUNING, resolveConfig, VariantsConfigSchema } from '../src/config.ts';

// --- [TESTS] -----------------------------------------------------------------

describe('config', () => {
    it('defaults to conflict-aware merging', () => {
        expect(resolveConfig(undefined)).toEqual({ twMerge: true });
        expect(S.decodeUnknownSync(VariantsConfigSchema)({})).toEqual({ twMerge: true });
    });
    it('takes an explicit toggle', () => {
        expect(resolveConfig({ twMerge: false })).toEqual({ twMerge: false });
    });
    it('layers over the base it is given', () => {
        expect(resolveConfig({}, { twMerge: false })).toEqual({ twMerge: false });
        expect(resolveConfig({ twMerge: true }, { twMerge: false })).toEqual({ twMerge: true });
    });
    it('drops unknown keys', () => {
        expect(resolveConfig({ extra: 1, twMerge: false })).toEqual({ twMerge: false });
    });
    it.prop([fc.oneof(fc.string(), fc.integer(), fc.constant(null), fc.record({ twMerge: fc.string() }))])(
        'falls back to the base for undecodable input',
        (input) => {
            expect(resolveConfig(input, { twMerge: false })).toEqual({ twMerge: false });
        },
    );
    it('returns frozen values', () => {
        expect(Object.isFrozen(resolveConfig({ twMerge: false }))).toBe(true);
        expect(Object.isFrozen(CONFIG_TUNING.defaults)).toBe(true);
    });
});
