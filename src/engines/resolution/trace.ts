/**
 * Refutation tracing
 */

import type { DerivationStep, Proposition } from '../../types/clause.js';
import type { ClauseArena } from './saturation.js';

export interface RefutationReport {
    /** Ancestors of the empty clause, itself included, in creation order */
    steps: DerivationStep[];
    ruleIds: string[];
    facts: Proposition[];
    queries: Proposition[];
}

/**
 * Walk parent links back from a clause and collect the inputs it rests on,
 * including every input that duplicated one of them. Ids come out in trace
 * order; callers put them in declaration order.
 */
export function traceRefutation(arena: ClauseArena, emptyClauseId: number): RefutationReport {
    const seen = new Set<number>();
    const pending = [emptyClauseId];

    while (pending.length > 0) {
        const id = pending.pop();
        if (id === undefined || seen.has(id)) continue;
        seen.add(id);
        pending.push(...arena.get(id).parents);
    }

    const steps = [...seen].sort((a, b) => a - b).map(id => arena.get(id));
    const report: RefutationReport = { steps, ruleIds: [], facts: [], queries: [] };

    for (const step of steps) {
        for (const origin of arena.originsOf(step.id)) {
            switch (origin.kind) {
                case 'rule': report.ruleIds.push(origin.ruleId); break;
                case 'fact': report.facts.push(origin.proposition); break;
                case 'query': report.queries.push(origin.proposition); break;
                case 'resolvent': break;
            }
        }
    }

    return report;
}
