/**
 * Decode per-definition configuration with schema defaults.
 * Undecodable input falls back to the layer below instead of failing.
 */
import { Option, pipe, Predicate, Schema as S } from 'effect';

// --- [SCHEMA] ----------------------------------------------------------------

const VariantsConfigSchema = S.Struct({
    twMerge: S.optionalWith(S.Boolean, { default: () => true }),
});

// --- [TYPES] -----------------------------------------------------------------

type VariantsConfig = S.Schema.Type<typeof VariantsConfigSchema>;
type ConfigInput = S.Schema.Encoded<typeof VariantsConfigSchema>;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaults: Object.freeze({ twMerge: true }) satisfies VariantsConfig,
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const decode = S.decodeUnknownOption(VariantsConfigSchema);

/** Layer `input` over `base`; both sides are decoded, so unknown keys are dropped. */
const resolveConfig = (input: unknown, base: VariantsConfig = B.defaults): VariantsConfig =>
    pipe(
        Predicate.isRecord(input) ? decode({ ...base, ...input }) : Option.none(),
        Option.getOrElse(() => base),
        (config) => Object.freeze({ twMerge: config.twMerge }),
    );

// --- [EXPORT] ----------------------------------------------------------------

export { B as CONFIG_TUNING, resolveConfig, VariantsConfigSchema };
export type { ConfigInput, VariantsConfig };
