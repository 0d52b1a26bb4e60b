/**
 * Class-string matchers: compare utility class lists as sets or as ordered tokens.
 */
import { expect } from 'vitest';

// --- [TYPES] -----------------------------------------------------------------

type MatcherResult = { message: () => string; pass: boolean };
interface ClassMatchers<R = unknown> {
    toHaveClassTokens: (expected: ReadonlyArray<string>) => R;
    toMatchClasses: (expected: string) => R;
}
declare module 'vitest' {
    // biome-ignore lint/suspicious/noExplicitAny: Vitest Matchers interface uses T = any
    interface Matchers<T = any> extends ClassMatchers<T> {}
}

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const split = (classes: unknown): ReadonlyArray<string> =>
    typeof classes === 'string' ? classes.split(/\s+/).filter((token) => token.length > 0) : [];
const sorted = (classes: unknown): ReadonlyArray<string> => [...split(classes)].sort();
const difference = (left: ReadonlyArray<string>, right: ReadonlyArray<string>): ReadonlyArray<string> =>
    left.filter((token) => !right.includes(token));
const describe = (expected: ReadonlyArray<string>, actual: ReadonlyArray<string>): string =>
    [
        `expected: ${JSON.stringify(expected)}`,
        `received: ${JSON.stringify(actual)}`,
        `only expected: ${JSON.stringify(difference(expected, actual))}`,
        `only received: ${JSON.stringify(difference(actual, expected))}`,
    ].join('\n');

// --- [ENTRY_POINT] -----------------------------------------------------------

expect.extend({
    /** Exact token sequence, whitespace-insensitive. */
    toHaveClassTokens(received: unknown, expected: ReadonlyArray<string>): MatcherResult {
        const actual = split(received);
        const pass = actual.length === expected.length && actual.every((token, index) => token === expected[index]);
        return {
            message: () => (pass ? `expected tokens to differ from ${JSON.stringify(expected)}` : describe(expected, actual)),
            pass,
        };
    },
    /** Same class set regardless of order. */
    toMatchClasses(received: unknown, expected: string): MatcherResult {
        const actual = sorted(received);
        const wanted = sorted(expected);
        const pass = actual.length === wanted.length && actual.every((token, index) => token === wanted[index]);
        return {
            message: () => (pass ? `expected classes not to match "${expected}"` : describe(wanted, actual)),
            pass,
        };
    },
});
