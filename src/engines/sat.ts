/**
 * SAT Engine
 *
 * Satisfiability over clauses using the logic-solver package (MiniSat in JS).
 * The resolution engine decides consistency; this finds a witness assignment
 * for consistent fact sets and serves as an independent check.
 */

/// <reference path="../types/logic-solver.d.ts" />
import Logic from 'logic-solver';
import type { Clause } from '../types/clause.js';

export interface SatResult {
    /** Whether the clauses are satisfiable */
    sat: boolean;
    /** Assignment of every variable when satisfiable */
    model: Map<string, boolean>;
    statistics: {
        variables: number;
        clauses: number;
        timeMs: number;
    };
}

/**
 * Check satisfiability of clauses.
 * Names in `vocabulary` that no clause mentions are reported as false in the model.
 * Proposition names map to generated solver variables, so any name is safe.
 */
export function solveClauses(clauses: readonly Clause[], vocabulary: Iterable<string> = []): SatResult {
    const startTime = Date.now();
    const variables = new Map<string, string>();
    const variableFor = (name: string): string => {
        let variable = variables.get(name);
        if (variable === undefined) {
            variable = `v${variables.size + 1}`;
            variables.set(name, variable);
        }
        return variable;
    };

    for (const name of vocabulary) variableFor(name);

    const statistics = () => ({
        variables: variables.size,
        clauses: clauses.length,
        timeMs: Date.now() - startTime,
    });

    const solver = new Logic.Solver();
    for (const clause of clauses) {
        if (clause.propositions.length === 0) {
            // Empty clause = unsatisfiable
            return { sat: false, model: new Map(), statistics: statistics() };
        }

        const disjuncts = clause.propositions.map(p => {
            const variable = variableFor(p.name);
            return p.negated ? Logic.not(variable) : variable;
        });
        solver.require(Logic.or(...disjuncts));
    }

    const solution = solver.solve();
    if (!solution) {
        return { sat: false, model: new Map(), statistics: statistics() };
    }

    const trueVars = new Set(solution.getTrueVars());
    const model = new Map<string, boolean>();
    for (const [name, variable] of variables) {
        model.set(name, trueVars.has(variable));
    }

    return { sat: true, model, statistics: statistics() };
}
