/**
 * Call-site helpers: loose class values in, one conflict-resolved string out.
 */
import { type ClassValue, clsx } from 'clsx';
import { defaultMerger, type Merger, merge } from './merge.ts';

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const cnWith =
    (merger: Merger) =>
    (...inputs: ClassValue[]): string =>
        merge(merger, [clsx(inputs)], true);
const cn = cnWith(defaultMerger);
/** Merge the output of several plain resolvers that share a props shape; later resolvers win conflicts. */
const composeVariants =
    <T extends object>(...fns: ReadonlyArray<(props: T) => string>) =>
    (props: T): string =>
        cn(...fns.map((fn) => fn(props)));

// --- [EXPORT] ----------------------------------------------------------------

export { cn, cnWith, composeVariants };
export type { ClassValue };
