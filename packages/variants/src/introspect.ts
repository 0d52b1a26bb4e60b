/**
 * Read-only projections of a definition for docs and dev tooling.
 * Nothing here is consulted during resolution.
 */
import { Data, Option, pipe, Record as R } from 'effect';
import type { Definition, Props } from './definition.ts';
import { effective, normalize } from './resolve.ts';

// --- [TYPES] -----------------------------------------------------------------

type VariantOptions = { readonly [variant: string]: ReadonlyArray<string> };
type Unmatched = Data.TaggedEnum<{
    UnknownValue: { readonly value: string; readonly variant: string };
    UnknownVariant: { readonly variant: string };
}>;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    exempt: new Set(['class']),
    unprintable: '<unprintable>',
} as const);

// --- [CLASSES] ---------------------------------------------------------------

const taggedEnum = Data.taggedEnum<Unmatched>();
// Constructors are read off a proxy, so members are copied by name.
const Unmatched = Object.freeze({
    $is: taggedEnum.$is,
    $match: taggedEnum.$match,
    format: (finding: Unmatched): string =>
        taggedEnum.$match(finding, {
            UnknownValue: (f) => `${f.variant}=${f.value} has no entry`,
            UnknownVariant: (f) => `${f.variant} is not a declared variant`,
        }),
    UnknownValue: taggedEnum.UnknownValue,
    UnknownVariant: taggedEnum.UnknownVariant,
});

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const variantOptions = (definition: Definition): VariantOptions =>
    Object.freeze(R.map(definition.variants, (values) => Object.freeze(Object.keys(values))));

const unknownVariants = (definition: Definition, props: Props): ReadonlyArray<Unmatched> =>
    Object.keys(props)
        .filter((name) => !B.exempt.has(name) && !Object.hasOwn(definition.variants, name))
        .map((variant) => Unmatched.UnknownVariant({ variant }));
const unknownValues = (definition: Definition, props: Props): ReadonlyArray<Unmatched> =>
    Object.entries(definition.variants).flatMap(([variant, values]) =>
        pipe(
            effective(definition, props, variant),
            Option.filter((value) =>
                Option.match(normalize(value), { onNone: () => true, onSome: (key) => !Object.hasOwn(values, key) }),
            ),
            Option.map((value) =>
                Unmatched.UnknownValue({
                    value: Option.getOrElse(normalize(value), () => B.unprintable),
                    variant,
                }),
            ),
            Option.toArray,
        ),
    );

/** Props the engine skipped: undeclared variant names, then declared variants without a matching value. */
const inspect = (definition: Definition, props: Props = {}): ReadonlyArray<Unmatched> =>
    Object.freeze([...unknownVariants(definition, props), ...unknownValues(definition, props)]);

// --- [EXPORT] ----------------------------------------------------------------

export { B as INTROSPECT_TUNING, inspect, Unmatched, variantOptions };
export type { VariantOptions };
