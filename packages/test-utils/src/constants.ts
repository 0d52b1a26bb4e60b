/**
 * Test constants: deterministic values for reproducible tests.
 */

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const env = (key: string): string | undefined => (typeof process === 'undefined' ? undefined : process.env[key]);
const seed = (): { readonly seed?: number } => {
    const raw = env('FC_SEED');
    return raw === undefined ? {} : { seed: Number.parseInt(raw, 10) };
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    classes: {
        prefix: 'cw-',
        reserved: ['__proto__', 'class', 'constructor', 'hasOwnProperty', 'prototype', 'slots', 'toString', 'valueOf'],
    },
    fc: {
        interruptAfterTimeLimit: 5_000,
        numRuns: env('CI') ? 100 : 50,
        ...seed(),
    },
} as const);

// --- [EXPORT] ----------------------------------------------------------------

export { B as TEST_CONSTANTS };
