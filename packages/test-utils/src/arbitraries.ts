/**
 * Arbitraries: fast-check generators for class tokens, variant tables and props.
 * Tokens carry a prefix no utility group claims, so the conflict resolver keeps them all.
 */
import fc from 'fast-check';
import { TEST_CONSTANTS } from './constants.ts';

// --- [TYPES] ----------------------------------------------------------------

type Table = { readonly [variant: string]: { readonly [value: string]: string } };
type TableWithProps = { readonly props: { readonly [variant: string]: string }; readonly table: Table };

// --- [CONSTANTS] ------------------------------------------------------------

const B = Object.freeze({
    names: /^[a-z]{1,8}$/,
    sizes: { tokens: 3, values: 4, variants: 3 },
} as const);

// --- [PURE_FUNCTIONS] -------------------------------------------------------

const fcName = (): fc.Arbitrary<string> =>
    fc
        .stringMatching(B.names)
        .filter((name) => !TEST_CONSTANTS.classes.reserved.some((reserved) => reserved === name));
const fcToken = (): fc.Arbitrary<string> => fcName().map((name) => `${TEST_CONSTANTS.classes.prefix}${name}`);
const fcClasses = (): fc.Arbitrary<string> =>
    fc.uniqueArray(fcToken(), { maxLength: B.sizes.tokens, minLength: 1 }).map((tokens) => tokens.join(' '));
const fcValues = (): fc.Arbitrary<{ readonly [value: string]: string }> =>
    fc.dictionary(fcName(), fcClasses(), { maxKeys: B.sizes.values, minKeys: 1 });
const fcTable = (): fc.Arbitrary<Table> =>
    fc.dictionary(fcName(), fcValues(), { maxKeys: B.sizes.variants, minKeys: 1 });
/** A table plus props that pick one declared value for every variant. */
const fcTableWithProps = (): fc.Arbitrary<TableWithProps> =>
    fcTable().chain((table) =>
        fc
            .tuple(...Object.entries(table).map(([variant, values]) => fc.tuple(fc.constant(variant), fc.constantFrom(...Object.keys(values)))))
            .map((picks) => ({ props: Object.fromEntries(picks), table })),
    );

// --- [ENTRY_POINT] ----------------------------------------------------------

const Arbitraries = Object.freeze({
    classes: fcClasses,
    name: fcName,
    table: fcTable,
    tableWithProps: fcTableWithProps,
    token: fcToken,
} as const);

// --- [EXPORT] ---------------------------------------------------------------

export { Arbitraries as FC_ARB, B as ARB_TUNING };
export type { Table, TableWithProps };
