/**
 * Variants entry point: factory over an injected merger, plus a default tailwind-merge instance.
 * Grounding: the merger is a capability handed to the factory, never ambient state.
 */
import { Effect, pipe, Record as R } from 'effect';
import { type ClassValue, cnWith } from './compose.ts';
import { type ConfigInput, resolveConfig, type VariantsConfig } from './config.ts';
import {
    type BuildContext,
    buildWith,
    type Component,
    type Definition,
    type Options,
    type PlainComponent,
    type PlainDefinition,
    type Props,
    type Resolution,
    type SlotClasses,
    type SlotProps,
    type SlotResolvers,
    type SlottedComponent,
    type SlottedDefinition,
} from './definition.ts';
import { VariantsError } from './errors.ts';
import { inspect, Unmatched, type VariantOptions, variantOptions } from './introspect.ts';
import { defaultMerger, type Merger } from './merge.ts';
import { resolveWith } from './resolve.ts';

// --- [TYPES] -----------------------------------------------------------------

type SlottedOptions = Options & { readonly slots: SlotClasses };
type ExtendingOptions = Options & { readonly extend: SlottedComponent | SlottedDefinition };
type PlainOptions = Options & { readonly extend?: PlainComponent | PlainDefinition; readonly slots?: null };
type Rendered = string | { readonly [slot: string]: string };
type Build = {
    (options: SlottedOptions): SlottedDefinition;
    (options: ExtendingOptions): SlottedDefinition;
    (options?: PlainOptions): PlainDefinition;
    (options?: Options): Definition;
};
type Resolve = {
    (definition: SlottedDefinition, props?: Props): SlotResolvers;
    (definition: PlainDefinition, props?: Props): string;
    (definition: Definition, props?: Props): Resolution;
};
type Tv = {
    (options: SlottedOptions): SlottedComponent;
    (options: ExtendingOptions): SlottedComponent;
    (options?: PlainOptions): PlainComponent;
    (options?: Options): Component;
};
type VariantsOptions = { readonly config?: ConfigInput; readonly merger?: Merger };
type VariantsApi = {
    readonly build: Build;
    readonly cn: (...inputs: ClassValue[]) => string;
    readonly config: VariantsConfig;
    readonly inspect: typeof inspect;
    readonly merger: Merger;
    readonly render: (definition: Definition, props?: Props, slotProps?: SlotProps) => Effect.Effect<Rendered, VariantsError>;
    readonly resolve: Resolve;
    readonly tv: Tv;
    readonly variantOptions: (definition: Definition) => VariantOptions;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    logs: { ignored: 'Ignored variant prop', resolved: 'Resolved classes' },
    module: 'variants',
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const materialize = (resolution: Resolution, slotProps: SlotProps): Rendered =>
    typeof resolution === 'string' ? resolution : Object.freeze(R.map(resolution, (slot) => slot(slotProps)));

// --- [ENTRY_POINT] -----------------------------------------------------------

const createVariants = (settings: VariantsOptions = {}): VariantsApi => {
    const ctx: BuildContext = { config: resolveConfig(settings.config), merger: settings.merger ?? defaultMerger };
    function build(options: SlottedOptions): SlottedDefinition;
    function build(options: ExtendingOptions): SlottedDefinition;
    function build(options?: PlainOptions): PlainDefinition;
    function build(options?: Options): Definition;
    function build(options: Options = {}): Definition {
        return buildWith(ctx, options);
    }
    function resolve(definition: SlottedDefinition, props?: Props): SlotResolvers;
    function resolve(definition: PlainDefinition, props?: Props): string;
    function resolve(definition: Definition, props?: Props): Resolution;
    function resolve(definition: Definition, props: Props = {}): Resolution {
        return resolveWith(ctx.merger, definition, props);
    }
    function tv(options: SlottedOptions): SlottedComponent;
    function tv(options: ExtendingOptions): SlottedComponent;
    function tv(options?: PlainOptions): PlainComponent;
    function tv(options?: Options): Component;
    function tv(options: Options = {}): Component {
        const definition = buildWith(ctx, options);
        return Object.freeze(Object.assign((props?: Props) => resolveWith(ctx.merger, definition, props), { definition }));
    }
    /** Resolve eagerly (every slot included), logging ignored props at debug level. */
    const render = (definition: Definition, props: Props = {}, slotProps: SlotProps = {}) =>
        pipe(
            Effect.forEach(
                inspect(definition, props),
                (finding) => Effect.logDebug(B.logs.ignored, { finding: Unmatched.format(finding) }),
                { discard: true },
            ),
            Effect.zipRight(
                Effect.try({
                    catch: (cause) => VariantsError.from('MERGE_FAILED', cause),
                    try: () => materialize(resolveWith(ctx.merger, definition, props), slotProps),
                }),
            ),
            Effect.tap((rendered) =>
                Effect.logDebug(B.logs.resolved, { slots: typeof rendered === 'string' ? 0 : Object.keys(rendered).length }),
            ),
            Effect.annotateLogs({ module: B.module }),
        );
    return Object.freeze({
        build,
        cn: cnWith(ctx.merger),
        config: ctx.config,
        inspect,
        merger: ctx.merger,
        render,
        resolve,
        tv,
        variantOptions,
    });
};

const variants = createVariants();
const { build, cn, render, resolve, tv } = variants;

// --- [EXPORT] ----------------------------------------------------------------

export { B as VARIANTS_TUNING, build, cn, createVariants, inspect, render, resolve, tv, variantOptions, variants };
export type { Build, PlainOptions, Rendered, Resolve, SlottedOptions, Tv, VariantsApi, VariantsOptions };
