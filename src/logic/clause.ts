/**
 * CNF Clause Utilities
 *
 * Construction, resolution and subsumption over propositional clauses.
 */

import type { Clause, Proposition } from '../types/clause.js';
import {
    areComplementary,
    compareProposition,
    negate,
    propositionEquals,
    propositionKey,
    propositionToString,
} from './proposition.js';

/**
 * Create a clause: duplicates collapse and propositions take canonical order,
 * so clauses with the same content share a key.
 */
export function createClause(propositions: Iterable<Proposition>): Clause {
    const unique = new Map<string, Proposition>();
    for (const p of propositions) {
        const key = propositionKey(p);
        if (!unique.has(key)) unique.set(key, p);
    }
    const sorted = [...unique.values()].sort(compareProposition);
    return Object.freeze({
        propositions: Object.freeze(sorted),
        key: JSON.stringify(sorted.map(propositionKey)),
    });
}

export const EMPTY_CLAUSE: Clause = createClause([]);

export function isEmptyClause(clause: Clause): boolean {
    return clause.propositions.length === 0;
}

export function isUnitClause(clause: Clause): boolean {
    return clause.propositions.length === 1;
}

/**
 * Check if a clause is a tautology (contains complementary propositions).
 * Canonical order puts `P` right before `¬P`.
 */
export function isTautology(clause: Clause): boolean {
    const props = clause.propositions;
    for (let i = 0; i + 1 < props.length; i++) {
        if (areComplementary(props[i], props[i + 1])) return true;
    }
    return false;
}

export function containsProposition(clause: Clause, p: Proposition): boolean {
    return clause.propositions.some(q => propositionEquals(q, p));
}

/**
 * Resolve two clauses on `pivot` (in `left`) and its complement (in `right`).
 * Returns null when the complement is missing or the resolvent is a tautology.
 */
export function resolveOn(left: Clause, right: Clause, pivot: Proposition): Clause | null {
    const complement = negate(pivot);
    if (!containsProposition(left, pivot) || !containsProposition(right, complement)) {
        return null;
    }

    const pivotKey = propositionKey(pivot);
    const complementKey = propositionKey(complement);
    const resolvent = createClause([
        ...left.propositions.filter(p => propositionKey(p) !== pivotKey),
        ...right.propositions.filter(p => propositionKey(p) !== complementKey),
    ]);

    return isTautology(resolvent) ? null : resolvent;
}

/**
 * Resolve two clauses on their first complementary pair.
 * Clauses clashing on more than one pair only yield tautologies, so one pair suffices.
 */
export function resolve(left: Clause, right: Clause): { clause: Clause; pivot: Proposition } | null {
    for (const p of left.propositions) {
        if (right.propositions.some(q => areComplementary(p, q))) {
            const clause = resolveOn(left, right, p);
            return clause ? { clause, pivot: p } : null;
        }
    }
    return null;
}

/**
 * `general` subsumes `specific` when every proposition of `general` occurs in `specific`.
 */
export function subsumes(general: Clause, specific: Clause): boolean {
    if (general.propositions.length > specific.propositions.length) return false;
    const keys = new Set(specific.propositions.map(propositionKey));
    return general.propositions.every(p => keys.has(propositionKey(p)));
}

/**
 * Format a clause as a string (disjunction of propositions).
 */
export function clauseToString(clause: Clause): string {
    if (clause.propositions.length === 0) return '□'; // Empty clause = false
    return clause.propositions.map(propositionToString).join(' ∨ ');
}

/**
 * Format CNF as a string (conjunction of clauses).
 */
export function cnfToString(clauses: readonly Clause[]): string {
    if (clauses.length === 0) return '⊤'; // No clauses = true
    return clauses.map(c => `(${clauseToString(c)})`).join(' ∧ ');
}
