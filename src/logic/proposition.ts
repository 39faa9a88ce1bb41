import type { Proposition } from '../types/clause.js';

/**
 * Create a frozen proposition.
 */
export function createProposition(name: string, negated: boolean = false): Proposition {
    return Object.freeze({ name, negated });
}

export function negate(p: Proposition): Proposition {
    return createProposition(p.name, !p.negated);
}

/**
 * Check if two propositions are complementary (same name, opposite sign).
 */
export function areComplementary(a: Proposition, b: Proposition): boolean {
    return a.name === b.name && a.negated !== b.negated;
}

export function propositionEquals(a: Proposition, b: Proposition): boolean {
    return a.name === b.name && a.negated === b.negated;
}

/**
 * Unique key of a proposition including its sign.
 * The fixed-width sign prefix keeps keys unambiguous for any name.
 */
export function propositionKey(p: Proposition): string {
    return `${p.negated ? '-' : '+'}${p.name}`;
}

/**
 * Canonical order: by name, positive before negated.
 */
export function compareProposition(a: Proposition, b: Proposition): number {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.negated === b.negated) return 0;
    return a.negated ? 1 : -1;
}

/**
 * Format a proposition as `A` or `¬A`.
 */
export function propositionToString(p: Proposition): string {
    return p.negated ? `¬${p.name}` : p.name;
}
