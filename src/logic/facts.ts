/**
 * Fact sets
 *
 * Callers hand in facts as a name → boolean record, a Map, a list of
 * `[name, value]` entries or a list of literals. Lists and maps built from
 * several sources can disagree with themselves; that is rejected here, before
 * any resolution starts.
 */

import type { Proposition } from '../types/clause.js';
import { createConflictingFactsError, createInvalidFactError } from '../types/errors.js';
import { createProposition } from './proposition.js';

export type FactEntry = readonly [name: string, value: boolean];

export type FactSet =
    | Readonly<Record<string, boolean>>
    | ReadonlyMap<string, boolean>
    | ReadonlyArray<FactEntry | Proposition>;

function isFactMap(facts: FactSet): facts is ReadonlyMap<string, boolean> {
    return facts instanceof Map;
}

function isFactList(facts: FactSet): facts is ReadonlyArray<FactEntry | Proposition> {
    return Array.isArray(facts);
}

function isProposition(item: FactEntry | Proposition): item is Proposition {
    return !Array.isArray(item);
}

function entriesOf(facts: FactSet): Array<[string, unknown]> {
    if (isFactMap(facts)) {
        return [...facts.entries()];
    }
    if (isFactList(facts)) {
        return facts.map((item): [string, unknown] =>
            isProposition(item) ? [item.name, !item.negated] : [item[0], item[1]]
        );
    }
    return Object.entries(facts);
}

/**
 * Normalize a fact set to literals in input order: `P` for true, `¬P` for false.
 * Repeated agreeing facts collapse; disagreeing ones throw ConflictingFactsError.
 */
export function normalizeFacts(facts: FactSet): Proposition[] {
    const values = new Map<string, boolean>();

    for (const [name, value] of entriesOf(facts)) {
        if (typeof name !== 'string' || !name.trim()) {
            throw createInvalidFactError('Fact names cannot be empty', { name });
        }
        if (typeof value !== 'boolean') {
            throw createInvalidFactError(`Fact '${name}' must be true or false`, { name, value });
        }

        const previous = values.get(name);
        if (previous !== undefined && previous !== value) {
            throw createConflictingFactsError(name);
        }
        values.set(name, value);
    }

    return [...values].map(([name, value]) => createProposition(name, !value));
}

/**
 * Convert literals back to a name → boolean record.
 */
export function factsToRecord(facts: readonly Proposition[]): Record<string, boolean> {
    const record: Record<string, boolean> = {};
    for (const p of facts) {
        record[p.name] = !p.negated;
    }
    return record;
}
