/**
 * Scenario runner
 *
 * A scenario pairs a fact set and mode with the expected outcome. It passes
 * when the verdict matches and every expected violated rule is among the
 * reported ones.
 */

import type { LogicError } from './types/errors.js';
import type { Verdict } from './types/responses.js';
import { LogicException } from './types/errors.js';
import type { ResolutionEngine } from './engines/resolution/index.js';
import type { ReasoningOptions } from './types/options.js';

export interface Scenario<M extends string = string> {
    id: string;
    description: string;
    mode: M;
    facts: Record<string, boolean>;
    expected: 'valid' | 'invalid';
    /** Rules the refutation must involve when the scenario is invalid */
    violatedRules?: string[];
}

export type ScenarioStatus = 'pass' | 'fail' | 'error';

export interface ScenarioResult<M extends string = string> {
    scenario: Scenario<M>;
    status: ScenarioStatus;
    verdict?: Verdict<M>;
    /** Expected violated rules missing from the verdict */
    missingRules: string[];
    error?: LogicError;
}

export interface ScenarioReport<M extends string = string> {
    results: ScenarioResult<M>[];
    total: number;
    passed: number;
    failed: number;
    errors: number;
}

/**
 * Run scenarios in order. Caller errors of a scenario (unknown mode,
 * conflicting facts, limits) are recorded on its result.
 */
export function runScenarios<M extends string>(
    engine: ResolutionEngine<M>,
    scenarios: readonly Scenario<M>[],
    options: ReasoningOptions = {}
): ScenarioReport<M> {
    const results = scenarios.map(scenario => runScenario(engine, scenario, options));
    return {
        results,
        total: results.length,
        passed: results.filter(r => r.status === 'pass').length,
        failed: results.filter(r => r.status === 'fail').length,
        errors: results.filter(r => r.status === 'error').length,
    };
}

export function runScenario<M extends string>(
    engine: ResolutionEngine<M>,
    scenario: Scenario<M>,
    options: ReasoningOptions = {}
): ScenarioResult<M> {
    let verdict: Verdict<M>;
    try {
        verdict = engine.checkConsistency(scenario.facts, scenario.mode, options);
    } catch (e) {
        if (e instanceof LogicException) {
            return { scenario, status: 'error', missingRules: [], error: e.error };
        }
        throw e;
    }

    const expectedConsistent = scenario.expected === 'valid';
    const missingRules = (scenario.violatedRules ?? []).filter(id => !verdict.violatedRuleIds.includes(id));
    const status: ScenarioStatus =
        verdict.consistent === expectedConsistent && missingRules.length === 0 ? 'pass' : 'fail';

    return { scenario, status, verdict, missingRules };
}
