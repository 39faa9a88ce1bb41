/**
 * Resolution Engine
 *
 * Decides consistency of a fact set with the rules of a knowledge base, and
 * entailment by refutation, with Robinson resolution over propositional CNF.
 * Every call builds its own clause universe from the immutable knowledge base
 * and the caller's facts, and discards it on return.
 */

import type { Clause, Proposition } from '../../types/clause.js';
import type { CheckOptions, EngineLimits, ReasoningOptions } from '../../types/options.js';
import type { EntailmentResult, Verdict } from '../../types/responses.js';
import { DEFAULTS } from '../../types/options.js';
import { createEngineError, createUnsatisfiableError } from '../../types/errors.js';
import { KnowledgeBase } from '../../knowledgeBase.js';
import { createClause, isTautology } from '../../logic/clause.js';
import { normalizeFacts, FactSet } from '../../logic/facts.js';
import { compareProposition, createProposition, negate, propositionKey } from '../../logic/proposition.js';
import { ruleToClause } from '../../logic/rule.js';
import { solveClauses } from '../sat.js';
import { InputClause, saturate, SaturationResult } from './saturation.js';
import { traceRefutation } from './trace.js';
import type { RefutationReport } from './trace.js';

export { ClauseArena, saturate } from './saturation.js';
export type { InputClause, SaturationOutcome, SaturationResult } from './saturation.js';
export { traceRefutation } from './trace.js';
export type { RefutationReport } from './trace.js';

/**
 * The clause universe of one call.
 */
export interface ClauseUniverse {
    inputs: InputClause[];
    facts: Proposition[];
    excludedRuleIds: string[];
    /** Proposition names of the inputs in first-seen order */
    vocabulary: string[];
}

export class ResolutionEngine<M extends string = string> {
    readonly knowledgeBase: KnowledgeBase<M>;
    private readonly limits: EngineLimits;

    constructor(knowledgeBase: KnowledgeBase<M>, limits: Partial<EngineLimits> = {}) {
        this.knowledgeBase = knowledgeBase;
        this.limits = {
            maxClauses: limits.maxClauses ?? DEFAULTS.maxClauses,
            maxResolutions: limits.maxResolutions ?? DEFAULTS.maxResolutions,
        };
    }

    /**
     * Build the clause universe: the CNF clause of every rule applicable to
     * `mode` (tautologies excluded), then one unit clause per fact in
     * canonical order, so the search never depends on how the facts were keyed.
     * Throws ConflictingFactsError before anything is resolved.
     */
    buildUniverse(facts: FactSet, mode: M, extra: readonly InputClause[] = []): ClauseUniverse {
        const literals = normalizeFacts(facts).sort(compareProposition);
        const rules = this.knowledgeBase.rulesForMode(mode);

        const inputs: InputClause[] = [];
        const excludedRuleIds: string[] = [];
        for (const rule of rules) {
            const clause = ruleToClause(rule);
            if (isTautology(clause)) {
                excludedRuleIds.push(rule.id);
                continue;
            }
            inputs.push({ clause, origin: { kind: 'rule', ruleId: rule.id } });
        }
        for (const proposition of literals) {
            inputs.push({ clause: createClause([proposition]), origin: { kind: 'fact', proposition } });
        }
        inputs.push(...extra);

        const vocabulary = [...new Set(inputs.flatMap(input => input.clause.propositions.map(p => p.name)))];
        return { inputs, facts: literals, excludedRuleIds, vocabulary };
    }

    /**
     * Check whether the facts are consistent with the rules active in `mode`.
     * An inconsistent fact set is a normal verdict, not an error.
     */
    checkConsistency(facts: FactSet, mode: M, options: CheckOptions = {}): Verdict<M> {
        const startTime = Date.now();
        const universe = this.buildUniverse(facts, mode);
        const run = saturate(universe.inputs, this.limits, options);
        const statistics = {
            clauses: run.arena.size,
            resolutions: run.resolutions,
            timeMs: Date.now() - startTime,
        };

        if (run.outcome.status === 'saturated') {
            const verdict: Verdict<M> = {
                consistent: true,
                mode,
                violatedRuleIds: [],
                contradictoryPropositions: [],
                derivationTrace: [],
                excludedRuleIds: universe.excludedRuleIds,
                statistics,
            };
            if (options.withModel) {
                verdict.model = this.witness(universe);
            }
            return verdict;
        }

        const report = traceRefutation(run.arena, run.outcome.emptyClauseId);
        const falsified = falsifiedRules(universe);
        return {
            consistent: false,
            mode,
            violatedRuleIds: inDeclarationOrder(universe, [...report.ruleIds, ...falsified.ruleIds]),
            contradictoryPropositions: inFactOrder(universe, [...report.facts, ...falsified.facts]),
            derivationTrace: options.includeTrace === false ? [] : report.steps,
            excludedRuleIds: universe.excludedRuleIds,
            statistics,
        };
    }

    /**
     * Whether the facts force `query` under the rules active in `mode`:
     * facts ∧ rules ∧ ¬query is refutable. Inconsistent facts entail everything.
     */
    entails(facts: FactSet, mode: M, query: Proposition, options: ReasoningOptions = {}): boolean {
        return this.refuteNegation(facts, mode, query, options).run.outcome.status === 'refuted';
    }

    /**
     * Entailment with the refutation of the negated query.
     */
    prove(facts: FactSet, mode: M, query: Proposition, options: ReasoningOptions = {}): EntailmentResult<M> {
        const startTime = Date.now();
        const { universe, run } = this.refuteNegation(facts, mode, query, options);
        const statistics = {
            clauses: run.arena.size,
            resolutions: run.resolutions,
            timeMs: Date.now() - startTime,
        };

        if (run.outcome.status === 'saturated') {
            return {
                entailed: false,
                mode,
                query,
                supportingRuleIds: [],
                supportingFacts: [],
                derivationTrace: [],
                statistics,
            };
        }

        const report = traceRefutation(run.arena, run.outcome.emptyClauseId);
        return {
            entailed: true,
            mode,
            query,
            supportingRuleIds: inDeclarationOrder(universe, report.ruleIds),
            supportingFacts: inFactOrder(universe, report.facts),
            derivationTrace: options.includeTrace === false ? [] : report.steps,
            statistics,
        };
    }

    /**
     * Literals over the active vocabulary, not fixed by the facts, that the
     * facts entail. Throws UNSATISFIABLE for inconsistent facts, which would
     * entail every literal.
     */
    deriveConsequences(facts: FactSet, mode: M, options: ReasoningOptions = {}): Proposition[] {
        const verdict = this.checkConsistency(facts, mode, { ...options, includeTrace: false });
        if (!verdict.consistent) {
            throw createUnsatisfiableError(undefined, {
                mode,
                violatedRuleIds: verdict.violatedRuleIds,
            });
        }

        const universe = this.buildUniverse(facts, mode);
        const fixed = new Set(universe.facts.map(p => p.name));
        const derived: Proposition[] = [];
        for (const name of universe.vocabulary) {
            if (fixed.has(name)) continue;
            const positive = createProposition(name);
            if (this.entails(facts, mode, positive, options)) {
                derived.push(positive);
            } else if (this.entails(facts, mode, negate(positive), options)) {
                derived.push(negate(positive));
            }
        }
        return derived;
    }

    /**
     * A satisfying assignment over the active vocabulary, or null when the
     * facts are inconsistent with the rules.
     */
    findModel(facts: FactSet, mode: M): Record<string, boolean> | null {
        const universe = this.buildUniverse(facts, mode);
        const result = solveClauses(clausesOf(universe), universe.vocabulary);
        return result.sat ? Object.fromEntries(result.model) : null;
    }

    private witness(universe: ClauseUniverse): Record<string, boolean> {
        const result = solveClauses(clausesOf(universe), universe.vocabulary);
        if (!result.sat) {
            throw createEngineError('resolution saturated but the SAT solver found no model', {
                clauses: universe.inputs.length,
            });
        }
        return Object.fromEntries(result.model);
    }

    private refuteNegation(
        facts: FactSet,
        mode: M,
        query: Proposition,
        options: ReasoningOptions
    ): { universe: ClauseUniverse; run: SaturationResult } {
        const negated = negate(query);
        const universe = this.buildUniverse(facts, mode, [
            { clause: createClause([negated]), origin: { kind: 'query', proposition: negated } },
        ]);
        return { universe, run: saturate(universe.inputs, this.limits, options) };
    }
}

function clausesOf(universe: ClauseUniverse): Clause[] {
    return universe.inputs.map(input => input.clause);
}

/**
 * Rules whose every literal is contradicted by a fact, with those facts.
 * A refutation needs only one of them, so they are added to its report.
 */
function falsifiedRules(universe: ClauseUniverse): Pick<RefutationReport, 'ruleIds' | 'facts'> {
    const factKeys = new Set(universe.facts.map(propositionKey));
    const ruleIds: string[] = [];
    const facts: Proposition[] = [];
    for (const { clause, origin } of universe.inputs) {
        if (origin.kind !== 'rule') continue;
        const complements = clause.propositions.map(negate);
        if (complements.every(p => factKeys.has(propositionKey(p)))) {
            ruleIds.push(origin.ruleId);
            facts.push(...complements);
        }
    }
    return { ruleIds, facts };
}

/** Distinct rule ids in rule declaration order */
function inDeclarationOrder(universe: ClauseUniverse, ruleIds: readonly string[]): string[] {
    const wanted = new Set(ruleIds);
    return [...new Set(universe.inputs.flatMap(({ origin }) =>
        origin.kind === 'rule' && wanted.has(origin.ruleId) ? [origin.ruleId] : []
    ))];
}

/** Distinct facts in canonical order */
function inFactOrder(universe: ClauseUniverse, facts: readonly Proposition[]): Proposition[] {
    const wanted = new Set(facts.map(propositionKey));
    return universe.facts.filter(p => wanted.has(propositionKey(p)));
}

/**
 * Create a resolution engine over a knowledge base.
 */
export function createResolutionEngine<M extends string>(
    knowledgeBase: KnowledgeBase<M>,
    limits?: Partial<EngineLimits>
): ResolutionEngine<M> {
    return new ResolutionEngine(knowledgeBase, limits);
}
