/**
 * Tagged failure for the Effect surface; the sync API rethrows the original cause instead.
 */
import { Data } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type VariantsErrorCode = keyof typeof B.codes;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    codes: {
        MERGE_FAILED: { code: 'MERGE_FAILED' as const, message: 'Class merger threw while joining tokens' },
    },
    domain: 'variants',
} as const);

// --- [CLASSES] ---------------------------------------------------------------

class VariantsError extends Data.TaggedError('VariantsError')<{
    readonly cause: unknown;
    readonly code: VariantsErrorCode;
    readonly message: string;
}> {
    get formatted(): string { return `[${B.domain}:${this.code}] ${this.message}`; }
    static from(code: VariantsErrorCode, cause: unknown, message?: string): VariantsError {
        return new VariantsError({ cause, code, message: message ?? B.codes[code].message });
    }
}

// --- [EXPORT] ----------------------------------------------------------------

export { B as ERRORS_TUNING, VariantsError };
export type { VariantsErrorCode };
