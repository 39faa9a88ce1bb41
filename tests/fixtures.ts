/**
 * Shared test fixtures: small rulebooks and a truth-table oracle.
 */
import type { Clause, Proposition, RuleDefinition } from '../src/types/index.js';
import { createKnowledgeBase } from '../src/knowledgeBase.js';
import { createResolutionEngine, ResolutionEngine } from '../src/engines/resolution/index.js';

export type TestMode = 'today' | 'future';

export const MODES: readonly TestMode[] = ['today', 'future'];

export function engineFor(
    rules: ReadonlyArray<RuleDefinition<TestMode>>,
    modes: readonly TestMode[] = MODES
): ResolutionEngine<TestMode> {
    return createResolutionEngine(createKnowledgeBase(rules, { modes }));
}

// === Rulebooks ===
export const RULES = {
    // (A ∧ B) → C
    conjunction: [
        { id: 'R', english: 'A and B give C', antecedents: ['A', 'B'], consequent: 'C' },
    ],
    // A → B and A → ¬B: A is untenable
    opposed: [
        { id: 'R1', english: 'A gives B', formula: 'A -> B' },
        { id: 'R2', english: 'A denies B', formula: 'A -> -B' },
    ],
    // A → B only in the future network
    futureOnly: [
        { id: 'F', english: 'A gives B in the future', formula: 'A -> B', modes: ['future'] },
    ],
    // A → B → C
    chain: [
        { id: 'R1', english: 'A gives B', formula: 'A -> B' },
        { id: 'R2', english: 'B gives C', formula: 'B -> C' },
    ],
} satisfies Record<string, Array<RuleDefinition<TestMode>>>;

// === Truth-table oracle ===

function satisfies(clause: readonly Proposition[], assignment: ReadonlyMap<string, boolean>): boolean {
    return clause.some(p => assignment.get(p.name) === !p.negated);
}

/**
 * Every assignment of `names`, in binary counting order.
 */
export function* assignments(names: readonly string[]): Generator<Map<string, boolean>> {
    for (let bits = 0; bits < 1 << names.length; bits++) {
        yield new Map(names.map((name, i) => [name, (bits & (1 << i)) !== 0]));
    }
}

function namesOf(clauses: ReadonlyArray<readonly Proposition[]>): string[] {
    return [...new Set(clauses.flatMap(clause => clause.map(p => p.name)))];
}

/**
 * Brute-force satisfiability over the names the clauses mention.
 */
export function oracleSatisfiable(clauses: ReadonlyArray<readonly Proposition[]>): boolean {
    for (const assignment of assignments(namesOf(clauses))) {
        if (clauses.every(clause => satisfies(clause, assignment))) return true;
    }
    return false;
}

/**
 * Brute-force entailment: every model of the clauses satisfies the literal.
 */
export function oracleEntails(clauses: ReadonlyArray<readonly Proposition[]>, query: Proposition): boolean {
    return !oracleSatisfiable([...clauses, [{ name: query.name, negated: !query.negated }]]);
}

export function clauseHolds(clause: Clause, model: Readonly<Record<string, boolean>>): boolean {
    return clause.propositions.some(p => model[p.name] === !p.negated);
}
