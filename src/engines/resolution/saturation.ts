/**
 * Given-clause saturation
 *
 * Clauses live in an arena keyed by content. A FIFO queue holds clauses not
 * yet selected; a selected ("given") clause is resolved against every active
 * clause that holds a complementary proposition, found through the active
 * index, and then becomes active itself. New resolvents that are tautologies,
 * duplicates, or subsumed by an arena clause are dropped.
 *
 * The run ends on the empty clause (refuted) or on an empty queue (saturated).
 * With k proposition names there are at most 3^k distinct clauses, so an
 * unbounded run always terminates; the limits exist for large rule sets.
 */

import type { Clause, ClauseOrigin, DerivationStep } from '../../types/clause.js';
import type { EngineLimits, ReasoningOptions } from '../../types/options.js';
import { DEFAULTS } from '../../types/options.js';
import { createSaturationLimitError } from '../../types/errors.js';
import { isEmptyClause, resolveOn, subsumes } from '../../logic/clause.js';
import { negate, propositionKey } from '../../logic/proposition.js';

export interface InputClause {
    clause: Clause;
    origin: ClauseOrigin;
}

export type SaturationOutcome =
    | { status: 'refuted'; emptyClauseId: number }
    | { status: 'saturated' };

export interface SaturationResult {
    outcome: SaturationOutcome;
    arena: ClauseArena;
    resolutions: number;
}

/**
 * Clause store of one run. Ids are creation order; parents always precede
 * their resolvents.
 */
export class ClauseArena {
    private readonly steps: DerivationStep[] = [];
    private readonly byKey = new Map<string, number>();
    /** proposition key → ids of every arena clause holding it */
    private readonly occurrences = new Map<string, number[]>();
    /** clause id → origins of later inputs with the same content */
    private readonly duplicateOrigins = new Map<number, ClauseOrigin[]>();

    get size(): number {
        return this.steps.length;
    }

    get(id: number): DerivationStep {
        const step = this.steps[id];
        if (!step) {
            throw new RangeError(`No clause with id ${id}`);
        }
        return step;
    }

    hasClause(clause: Clause): boolean {
        return this.byKey.has(clause.key);
    }

    /**
     * Add a clause unless one with the same content exists.
     * Returns the new step, or undefined for a duplicate.
     */
    add(clause: Clause, parents: readonly number[], origin: ClauseOrigin): DerivationStep | undefined {
        if (this.byKey.has(clause.key)) return undefined;

        const step: DerivationStep = Object.freeze({
            id: this.steps.length,
            clause,
            parents: Object.freeze([...parents]),
            origin,
        });
        this.steps.push(step);
        this.byKey.set(clause.key, step.id);
        for (const p of clause.propositions) {
            const key = propositionKey(p);
            const ids = this.occurrences.get(key);
            if (ids) ids.push(step.id);
            else this.occurrences.set(key, [step.id]);
        }
        return step;
    }

    /**
     * Add an input clause. An input whose content is already in the arena adds
     * its origin to that clause and returns undefined.
     */
    addInput(clause: Clause, origin: ClauseOrigin): DerivationStep | undefined {
        const existing = this.byKey.get(clause.key);
        if (existing === undefined) {
            return this.add(clause, [], origin);
        }
        const origins = this.duplicateOrigins.get(existing);
        if (origins) origins.push(origin);
        else this.duplicateOrigins.set(existing, [origin]);
        return undefined;
    }

    /**
     * Every origin of a clause: its own first, then those of duplicate inputs.
     */
    originsOf(id: number): ClauseOrigin[] {
        return [this.get(id).origin, ...(this.duplicateOrigins.get(id) ?? [])];
    }

    /**
     * Forward subsumption: some arena clause is a subset of `clause`.
     * Candidates must share a proposition with it, so the occurrence lists suffice.
     */
    isSubsumed(clause: Clause): boolean {
        for (const p of clause.propositions) {
            for (const id of this.occurrences.get(propositionKey(p)) ?? []) {
                if (subsumes(this.get(id).clause, clause)) return true;
            }
        }
        return false;
    }

    all(): readonly DerivationStep[] {
        return this.steps;
    }
}

/**
 * Run resolution to a refutation or a fixpoint. Throws SaturationLimitExceeded
 * when a bound is reached first.
 */
export function saturate(
    inputs: readonly InputClause[],
    limits: EngineLimits,
    options: ReasoningOptions = {}
): SaturationResult {
    const maxClauses = options.maxClauses ?? limits.maxClauses;
    const maxResolutions = options.maxResolutions ?? limits.maxResolutions;
    const onProgress = options.onProgress;

    const arena = new ClauseArena();
    const queue: number[] = [];
    let resolutions = 0;

    for (const input of inputs) {
        const step = arena.addInput(input.clause, input.origin);
        if (!step) continue;
        if (isEmptyClause(step.clause)) {
            return { outcome: { status: 'refuted', emptyClauseId: step.id }, arena, resolutions };
        }
        queue.push(step.id);
    }

    /** proposition key → ids of active clauses holding it */
    const active = new Map<string, number[]>();
    let head = 0;

    while (head < queue.length) {
        const given = arena.get(queue[head++]);

        for (const pivot of given.clause.propositions) {
            const partners = active.get(propositionKey(negate(pivot))) ?? [];
            for (const partnerId of partners) {
                if (++resolutions > maxResolutions) {
                    throw createSaturationLimitError('resolutions', maxResolutions, {
                        clauses: arena.size,
                    });
                }

                const resolvent = resolveOn(given.clause, arena.get(partnerId).clause, pivot);
                if (!resolvent || arena.hasClause(resolvent)) continue;

                if (isEmptyClause(resolvent)) {
                    const empty = arena.add(resolvent, [partnerId, given.id], { kind: 'resolvent', pivot: pivot.name });
                    if (!empty) continue;
                    onProgress?.(1, `Refuted after ${resolutions} resolutions`);
                    return { outcome: { status: 'refuted', emptyClauseId: empty.id }, arena, resolutions };
                }

                if (arena.isSubsumed(resolvent)) continue;
                if (arena.size >= maxClauses) {
                    throw createSaturationLimitError('clauses', maxClauses, { resolutions });
                }

                const step = arena.add(resolvent, [partnerId, given.id], { kind: 'resolvent', pivot: pivot.name });
                if (step) queue.push(step.id);
            }
        }

        for (const p of given.clause.propositions) {
            const key = propositionKey(p);
            const ids = active.get(key);
            if (ids) ids.push(given.id);
            else active.set(key, [given.id]);
        }

        if (onProgress && head % DEFAULTS.progressInterval === 0) {
            onProgress(head / queue.length, `Processed ${head} of ${queue.length} clauses`);
        }
    }

    onProgress?.(1, `Saturated with ${arena.size} clauses`);
    return { outcome: { status: 'saturated' }, arena, resolutions };
}
