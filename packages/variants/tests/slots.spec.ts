/**
 * Validate slot resolution: per-slot entries, compound slots and precedence.
 */
import { it } from '@fast-check/vitest';
import { describe, expect } from 'vitest';
import { build, resolve, tv } from '../src/variants.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const card = build({
    compoundVariants: [{ class: { label: 'tracking-wide' }, color: 'primary', size: 'sm' }],
    slots: { base: 'rounded', label: 'font-medium' },
    variants: {
        color: { ghost: 'border', primary: { base: 'bg-blue-500', footer: 'hidden', label: 'text-white' } },
        size: { sm: { base: 'px-2 py-1', label: 'text-sm' } },
    },
});
const menu = build({
    compoundSlots: [
        { class: 'text-blue-500', slots: ['item', 'icon'] },
        { class: 'text-xs', size: 'sm', slots: ['item'] },
        { class: 'text-red-500', slots: ['missing'] },
    ],
    slots: { base: 'flex', icon: 'w-4 h-4', item: 'p-2' },
    variants: { size: { sm: { base: 'gap-1' } } },
});
const list = build({
    compoundSlots: [{ class: 'text-xs', size: ['sm', 'md'], slots: ['item'] }],
    defaultVariants: { size: 'md' },
    slots: { base: 'flex', item: 'p-2' },
    variants: { size: { lg: 'gap-4', md: 'gap-2', sm: 'gap-1' } },
});
const layered = {
    compoundSlots: [{ class: 'p-4', size: 'lg', slots: ['base'] }],
    compoundVariants: [{ class: { base: 'p-3' }, size: 'lg' }],
    slots: { base: 'p-1' },
    variants: { size: { lg: { base: 'p-2' } } },
};

// --- [TESTS] -----------------------------------------------------------------

describe('slots', () => {
    describe('resolvers', () => {
        it('returns one resolver per declared slot', () => {
            const slots = resolve(card, { color: 'primary' });
            expect(Object.keys(slots)).toEqual(['base', 'label']);
            expect(Object.isFrozen(slots)).toBe(true);
        });
        it('picks each slot entry from the selected values', () => {
            const { base, label } = resolve(card, { color: 'primary', size: 'sm' });
            expect(base?.()).toBe('rounded bg-blue-500 px-2 py-1');
            expect(label?.()).toBe('font-medium text-white text-sm tracking-wide');
            expect(label?.()).toMatchClasses('tracking-wide text-sm text-white font-medium');
        });
        it('returns slot bases alone without props', () => {
            const { base, label } = resolve(card);
            expect(base?.()).toBe('rounded');
            expect(label?.()).toBe('font-medium');
        });
        it('applies slot props last', () => {
            const { label } = resolve(card, { color: 'primary', size: 'sm' });
            expect(label?.({ class: 'text-black' })).toBe('font-medium text-sm tracking-wide text-black');
            expect(label?.({ class: null })).toBe('font-medium text-white text-sm tracking-wide');
        });
        it('ignores the component-level class prop', () => {
            expect(resolve(card, { class: 'hidden' })['base']?.()).toBe('rounded');
        });
        it('ignores entries for slots that were never declared', () => {
            expect(resolve(card, { color: 'primary' })['footer']).toBeUndefined();
        });
        it('works through components', () => {
            const component = tv({ slots: { root: 'grid' }, variants: { gap: { lg: { root: 'gap-8' } } } });
            expect(component({ gap: 'lg' })['root']?.()).toBe('grid gap-8');
        });
    });

    describe('plain entries under slots', () => {
        it('apply a plain variant entry to every slot', () => {
            const { base, label } = resolve(card, { color: 'ghost' });
            expect(base?.()).toBe('rounded border');
            expect(label?.()).toBe('font-medium border');
        });
        it('apply a plain compound class to every slot', () => {
            const flat = build({
                compoundVariants: [{ class: ['shadow-sm', 'ring-1'], tone: 'raised' }],
                slots: { body: 'p-2', head: 'font-bold' },
            });
            const { body, head } = resolve(flat, { tone: 'raised' });
            expect(body?.()).toBe('p-2 shadow-sm ring-1');
            expect(head?.()).toBe('font-bold shadow-sm ring-1');
        });
    });

    describe('compound slots', () => {
        it('add classes to every named slot', () => {
            const { base, icon, item } = resolve(menu);
            expect(base?.()).toBe('flex');
            expect(item?.()).toBe('p-2 text-blue-500');
            expect(icon?.()).toBe('w-4 h-4 text-blue-500');
        });
        it('respect their conditions', () => {
            const { base, icon, item } = resolve(menu, { size: 'sm' });
            expect(base?.()).toBe('flex gap-1');
            expect(item?.()).toBe('p-2 text-blue-500 text-xs');
            expect(icon?.()).toBe('w-4 h-4 text-blue-500');
        });
        it('match list conditions on any member', () => {
            expect(resolve(list, { size: 'sm' })['item']?.()).toBe('p-2 gap-1 text-xs');
            expect(resolve(list, { size: 'md' })['item']?.()).toBe('p-2 gap-2 text-xs');
        });
        it('skip a value outside the list', () => {
            expect(resolve(list, { size: 'lg' })['item']?.()).toBe('p-2 gap-4');
        });
        it('evaluate conditions against defaults', () => {
            const { base, item } = resolve(list);
            expect(item?.()).toBe('p-2 gap-2 text-xs');
            expect(base?.()).toBe('flex gap-2');
        });
        it('ignore slots that were never declared', () => {
            expect(Object.keys(resolve(menu))).toEqual(['base', 'icon', 'item']);
        });
    });

    describe('precedence', () => {
        it('orders slot base, variants, compound variants, compound slots, then slot props', () => {
            const { base } = resolve(build({ ...layered, config: { twMerge: false } }), { size: 'lg' });
            expect(base?.({ class: 'p-5' })).toHaveClassTokens(['p-1', 'p-2', 'p-3', 'p-4', 'p-5']);
            expect(base?.()).toBe('p-1 p-2 p-3 p-4');
        });
        it('lets the last layer win when merging', () => {
            const { base } = resolve(build(layered), { size: 'lg' });
            expect(base?.()).toBe('p-4');
            expect(base?.({ class: 'p-5' })).toBe('p-5');
        });
    });
});
