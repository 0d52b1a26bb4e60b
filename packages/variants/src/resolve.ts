/**
 * Resolve a definition against props into a class string or per-slot resolvers.
 * Precedence: base, variants, compound variants, compound slots, then the `class` override.
 */
import { Array as A, Option, pipe, Predicate, Record as R } from 'effect';
import {
    type ClassFragment,
    type CompoundSlot,
    type CompoundVariant,
    type Definition,
    isSlotClasses,
    type Props,
    type Resolution,
    type SlotClasses,
    type SlotProps,
    type SlotResolvers,
    type VariantEntry,
} from './definition.ts';
import { type Merger, merge } from './merge.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    reserved: new Set(['class', 'slots']),
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const present = (value: unknown): boolean => value !== null && value !== undefined;
/** Map a variant value onto its table key; only scalars have one. */
const normalize = (value: unknown): Option.Option<string> =>
    Predicate.isString(value)
        ? Option.some(value)
        : Predicate.isBoolean(value) || Predicate.isNumber(value) || Predicate.isBigInt(value)
          ? Option.some(String(value))
          : Option.none();
const effective = (definition: Definition, props: Props, variant: string): Option.Option<unknown> =>
    pipe(
        R.get(props, variant),
        Option.filter(present),
        Option.orElse(() => pipe(R.get(definition.defaultVariants, variant), Option.filter(present))),
    );
const lookup = (definition: Definition, props: Props, variant: string): Option.Option<VariantEntry> =>
    pipe(
        effective(definition, props, variant),
        Option.flatMap(normalize),
        Option.flatMap((key) =>
            pipe(
                R.get(definition.variants, variant),
                Option.flatMap((values) => R.get(values, key)),
            ),
        ),
    );
const holds = (required: unknown, actual: Option.Option<string>): boolean =>
    Predicate.isNullable(required)
        ? Option.isNone(actual)
        : Option.exists(normalize(required), (key) => Option.contains(actual, key));
const satisfies = (definition: Definition, props: Props, variant: string, required: unknown): boolean => {
    const actual = Option.flatMap(effective(definition, props, variant), normalize);
    return Array.isArray(required) ? required.some((candidate) => holds(candidate, actual)) : holds(required, actual);
};
/** True when every non-reserved key of `rule` holds for the effective props. Empty rules always hold. */
const matches = (definition: Definition, props: Props, rule: CompoundVariant | CompoundSlot): boolean =>
    Object.entries(rule).every(
        ([variant, required]) => B.reserved.has(variant) || satisfies(definition, props, variant, required),
    );
const fragmentOf = (entry: VariantEntry): ClassFragment => (isSlotClasses(entry) ? undefined : entry);
const slotFragmentOf = (entry: VariantEntry, slot: string): ClassFragment =>
    isSlotClasses(entry) ? Option.getOrUndefined(R.get(entry, slot)) : entry;
const variantEntries = (definition: Definition, props: Props): ReadonlyArray<VariantEntry> =>
    A.getSomes(Object.keys(definition.variants).map((variant) => lookup(definition, props, variant)));
const compoundEntries = (definition: Definition, props: Props): ReadonlyArray<VariantEntry> =>
    definition.compoundVariants.filter((rule) => matches(definition, props, rule)).map((rule) => rule.class);
const compoundSlotFragments = (definition: Definition, props: Props, slot: string): ReadonlyArray<ClassFragment> =>
    definition.compoundSlots
        .filter((rule) => rule.slots.includes(slot) && matches(definition, props, rule))
        .map((rule) => rule.class);

// --- [ENTRY_POINT] -----------------------------------------------------------

const classesWith = (merger: Merger, definition: Definition, props: Props = {}): string =>
    merge(
        merger,
        [
            definition.base,
            ...variantEntries(definition, props).map(fragmentOf),
            ...compoundEntries(definition, props).map(fragmentOf),
            props.class,
        ],
        definition.config.twMerge,
    );
const slotsWith = (merger: Merger, definition: Definition, slots: SlotClasses, props: Props = {}): SlotResolvers => {
    const variants = variantEntries(definition, props);
    const compounds = compoundEntries(definition, props);
    return Object.freeze(
        R.map(
            slots,
            (fragment, slot) =>
                (slotProps: SlotProps = {}): string =>
                    merge(
                        merger,
                        [
                            fragment,
                            ...variants.map((entry) => slotFragmentOf(entry, slot)),
                            ...compounds.map((entry) => slotFragmentOf(entry, slot)),
                            ...compoundSlotFragments(definition, props, slot),
                            slotProps.class,
                        ],
                        definition.config.twMerge,
                    ),
        ),
    );
};
const resolveWith = (merger: Merger, definition: Definition, props: Props = {}): Resolution => {
    const slots = definition.slots;
    return slots === null ? classesWith(merger, definition, props) : slotsWith(merger, definition, slots, props);
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as RESOLVE_TUNING, classesWith, effective, matches, normalize, resolveWith, slotsWith };
