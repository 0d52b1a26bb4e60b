/**
 * Build immutable component definitions, folding an optional parent in at build time.
 * The parent is read once; the result holds copies and no link back to it.
 */
import { Predicate, Record as R } from 'effect';
import { type ConfigInput, resolveConfig, type VariantsConfig } from './config.ts';
import { type ClassFragment, isEmpty, type Merger, merge } from './merge.ts';

// --- [TYPES] -----------------------------------------------------------------

type VariantValue = string | number | boolean | bigint | null | undefined;
type SlotClasses = { readonly [slot: string]: ClassFragment };
type VariantEntry = ClassFragment | SlotClasses;
type DefaultVariants = { readonly [variant: string]: VariantValue };
type VariantTable = { readonly [variant: string]: { readonly [value: string]: VariantEntry } };
type CompoundVariant = { readonly class?: VariantEntry } & { readonly [variant: string]: unknown };
type CompoundSlot = { readonly class?: ClassFragment; readonly slots: ReadonlyArray<string> } & {
    readonly [variant: string]: unknown;
};
type Props = { readonly class?: ClassFragment } & { readonly [variant: string]: unknown };
type SlotProps = { readonly class?: ClassFragment };
type SlotResolver = (slotProps?: SlotProps) => string;
type SlotResolvers = { readonly [slot: string]: SlotResolver };
type Resolution = string | SlotResolvers;
type Definition = {
    readonly _tag: 'Definition';
    readonly base: ClassFragment;
    readonly compoundSlots: ReadonlyArray<CompoundSlot>;
    readonly compoundVariants: ReadonlyArray<CompoundVariant>;
    readonly config: VariantsConfig;
    readonly defaultVariants: DefaultVariants;
    readonly slots: SlotClasses | null;
    readonly variants: VariantTable;
};
type PlainDefinition = Definition & { readonly slots: null };
type SlottedDefinition = Definition & { readonly slots: SlotClasses };
type Component = ((props?: Props) => Resolution) & { readonly definition: Definition };
type PlainComponent = ((props?: Props) => string) & { readonly definition: PlainDefinition };
type SlottedComponent = ((props?: Props) => SlotResolvers) & { readonly definition: SlottedDefinition };
type Options = {
    readonly base?: ClassFragment;
    readonly compoundSlots?: ReadonlyArray<CompoundSlot>;
    readonly compoundVariants?: ReadonlyArray<CompoundVariant>;
    readonly config?: ConfigInput;
    readonly defaultVariants?: DefaultVariants;
    readonly extend?: Component | Definition;
    readonly slots?: SlotClasses | null;
    readonly variants?: VariantTable;
};
type BuildContext = { readonly config: VariantsConfig; readonly merger: Merger };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    empty: Object.freeze({
        base: '',
        compoundSlots: Object.freeze([]),
        compoundVariants: Object.freeze([]),
    }),
    tag: 'Definition',
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const isSlotClasses = (entry: VariantEntry): entry is SlotClasses => Predicate.isRecord(entry);
const toDefinition = (source: Component | Definition): Definition =>
    typeof source === 'function' ? source.definition : source;
const isDefinition = (value: unknown): value is Definition => Predicate.isTagged(value, B.tag);
/** Tables and lists may arrive from untyped config; anything of the wrong shape reads as empty. */
const recordOr = <T extends object>(value: T | null | undefined, fallback: T): T =>
    Predicate.isRecord(value) ? value : fallback;
const listOf = <T>(value: ReadonlyArray<T> | undefined): ReadonlyArray<T> => (Array.isArray(value) ? value : []);
const tableOf = (variants: VariantTable | undefined): VariantTable =>
    R.filter(recordOr<VariantTable>(variants, {}), (values) => Predicate.isRecord(values));
const freezeFragment = (fragment: ClassFragment): ClassFragment =>
    Array.isArray(fragment) ? Object.freeze(fragment.map(freezeFragment)) : fragment;
const freezeEntry = (entry: VariantEntry): VariantEntry =>
    isSlotClasses(entry) ? Object.freeze(R.map(entry, freezeFragment)) : freezeFragment(entry);
const freezeVariants = (variants: VariantTable): VariantTable =>
    Object.freeze(R.map(variants, (values) => Object.freeze(R.map(values, freezeEntry))));
const freezeRules = <T extends object>(rules: ReadonlyArray<T>, freeze: (rule: T) => T): ReadonlyArray<T> =>
    Object.freeze(rules.filter(Predicate.isRecord).map((rule) => Object.freeze(freeze(rule))));
const freezeCondition = (required: unknown): unknown => (Array.isArray(required) ? Object.freeze([...required]) : required);
const freezeCompoundVariant = (rule: CompoundVariant): CompoundVariant => ({
    ...R.map(rule, freezeCondition),
    class: freezeEntry(rule.class),
});
const freezeCompoundSlot = (rule: CompoundSlot): CompoundSlot => ({
    ...R.map(rule, freezeCondition),
    class: freezeFragment(rule.class),
    slots: Object.freeze(Array.isArray(rule.slots) ? [...rule.slots] : []),
});
const freezeSlots = (slots: SlotClasses | null): SlotClasses | null =>
    slots === null ? null : Object.freeze(R.map(slots, freezeFragment));

// --- [MERGE_RULES] -----------------------------------------------------------

const mergeBase = (ctx: BuildContext, parent: Definition | undefined, base: ClassFragment): ClassFragment =>
    parent === undefined || isEmpty(parent.base) ? base : merge(ctx.merger, [parent.base, base], ctx.config.twMerge);
const mergeSlots = (
    ctx: BuildContext,
    parent: Definition | undefined,
    slots: SlotClasses | null,
): SlotClasses | null =>
    parent?.slots == null
        ? slots
        : R.union(parent.slots, slots ?? {}, (inherited, own) =>
              merge(ctx.merger, [inherited, own], ctx.config.twMerge),
          );
const mergeVariants = (parent: Definition | undefined, variants: VariantTable): VariantTable =>
    parent === undefined ? variants : R.union(parent.variants, variants, (inherited, own) => ({ ...inherited, ...own }));

// --- [ENTRY_POINT] -----------------------------------------------------------

const buildWith = (ctx: BuildContext, options: Options = {}): Definition => {
    const source = options.extend === undefined ? undefined : toDefinition(options.extend);
    const parent = isDefinition(source) ? source : undefined;
    const config = resolveConfig(options.config, ctx.config);
    const scoped: BuildContext = { config, merger: ctx.merger };
    return Object.freeze({
        _tag: B.tag,
        base: freezeFragment(mergeBase(scoped, parent, options.base ?? B.empty.base)),
        compoundSlots: freezeRules(
            [...(parent?.compoundSlots ?? B.empty.compoundSlots), ...listOf(options.compoundSlots)],
            freezeCompoundSlot,
        ),
        compoundVariants: freezeRules(
            [
                ...(parent?.compoundVariants ?? B.empty.compoundVariants),
                ...listOf(options.compoundVariants),
            ],
            freezeCompoundVariant,
        ),
        config,
        defaultVariants: Object.freeze({
            ...parent?.defaultVariants,
            ...recordOr<DefaultVariants>(options.defaultVariants, {}),
        }),
        slots: freezeSlots(mergeSlots(scoped, parent, Predicate.isRecord(options.slots) ? options.slots : null)),
        variants: freezeVariants(mergeVariants(parent, tableOf(options.variants))),
    });
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as DEFINITION_TUNING, buildWith, isSlotClasses, toDefinition };
export type {
    BuildContext,
    ClassFragment,
    Component,
    CompoundSlot,
    CompoundVariant,
    DefaultVariants,
    Definition,
    Options,
    PlainComponent,
    PlainDefinition,
    Props,
    Resolution,
    SlotClasses,
    SlotProps,
    SlotResolver,
    SlotResolvers,
    SlottedComponent,
    SlottedDefinition,
    VariantEntry,
    VariantTable,
    VariantValue,
};
