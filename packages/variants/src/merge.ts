/**
 * Flatten class fragments into tokens and join them, conflict-aware or plain.
 * Grounding: tailwind-merge owns the conflict rules; this module only feeds it ordered tokens.
 */
import { Predicate } from 'effect';
import {
    type ConfigExtension,
    type DefaultClassGroupIds,
    type DefaultThemeGroupIds,
    extendTailwindMerge,
    twJoin,
    twMerge,
} from 'tailwind-merge';

// --- [TYPES] -----------------------------------------------------------------

type ClassFragment = string | null | undefined | ReadonlyArray<ClassFragment>;
type MergerExtension<C extends string = never, T extends string = never> = ConfigExtension<
    DefaultClassGroupIds | C,
    DefaultThemeGroupIds | T
>;
/** Injected conflict resolver. Both functions must be pure for a fixed token sequence. */
type Merger = {
    readonly join: (tokens: ReadonlyArray<string>) => string;
    readonly resolve: (tokens: ReadonlyArray<string>) => string;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    separator: ' ',
    whitespace: /\s+/,
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const tokens = (fragments: ReadonlyArray<ClassFragment>): ReadonlyArray<string> =>
    fragments.flatMap((fragment): ReadonlyArray<string> =>
        Predicate.isString(fragment)
            ? fragment.split(B.whitespace).filter((token) => token.length > 0)
            : Array.isArray(fragment)
              ? tokens(fragment)
              : [],
    );
const merge = (merger: Merger, fragments: ReadonlyArray<ClassFragment>, enabled: boolean): string => {
    const flat = tokens(fragments);
    return flat.length === 0 ? '' : enabled ? merger.resolve(flat) : merger.join(flat);
};
const isEmpty = (fragment: ClassFragment): boolean => tokens([fragment]).length === 0;

// --- [ENTRY_POINT] -----------------------------------------------------------

/** Default merger, or one whose resolver knows extra class groups registered through tailwind-merge. */
const createMerger = <C extends string = never, T extends string = never>(extension?: MergerExtension<C, T>): Merger => {
    const resolver = extension === undefined ? twMerge : extendTailwindMerge<C, T>(extension);
    return Object.freeze({
        join: (flat: ReadonlyArray<string>) => twJoin(...flat),
        resolve: (flat: ReadonlyArray<string>) => resolver(flat.join(B.separator)),
    });
};
const defaultMerger = createMerger();

// --- [EXPORT] ----------------------------------------------------------------

export { B as MERGE_TUNING, createMerger, defaultMerger, isEmpty, merge, tokens };
export type { ClassFragment, Merger, MergerExtension };
