/**
 * Tests for the scenario runner
 */

import { runScenario, runScenarios, Scenario } from '../src/scenarios.js';
import { createResolutionEngine } from '../src/engines/resolution/index.js';
import { createKnowledgeBaseFromRulebook, defaultRulebook, defaultScenarios } from '../src/config/index.js';

const engine = createResolutionEngine(createKnowledgeBaseFromRulebook(defaultRulebook()));

describe('Bundled MRT scenarios', () => {
    const report = runScenarios(engine, defaultScenarios());

    test('all pass', () => {
        expect(report.total).toBe(10);
        expect(report.passed).toBe(10);
        expect(report.failed).toBe(0);
        expect(report.errors).toBe(0);
    });

    test('invalid scenarios report exactly their expected rules', () => {
        const violated = Object.fromEntries(
            report.results
                .filter(result => result.scenario.expected === 'invalid')
                .map(result => [result.scenario.id, result.verdict?.violatedRuleIds])
        );
        expect(violated).toEqual({
            S2: ['R2'],
            S3: ['R3'],
            S4: ['R12', 'R13'],
            S6: ['R2', 'R6'],
            S7: ['R8'],
            S10: ['R5'],
        });
    });
});

describe('runScenario', () => {
    const base: Scenario = {
        id: 'X1',
        description: 'Expo open during works',
        mode: 'today',
        facts: { Integration_Work_Expo: true, Station_Open_Expo: true },
        expected: 'invalid',
    };

    test('a wrong expectation fails', () => {
        const result = runScenario(engine, { ...base, expected: 'valid' });
        expect(result.status).toBe('fail');
        expect(result.verdict?.consistent).toBe(false);
    });

    test('expected rules missing from the verdict fail the scenario', () => {
        const result = runScenario(engine, { ...base, violatedRules: ['R2', 'R6'] });
        expect(result.status).toBe('fail');
        expect(result.missingRules).toEqual(['R6']);
    });

    test('caller errors are recorded, not thrown', () => {
        const result = runScenario(engine, { ...base, mode: 'past' });
        expect(result.status).toBe('error');
        expect(result.error?.code).toBe('CONFIGURATION_ERROR');
        expect(result.verdict).toBeUndefined();
    });

    test('limits reached during a scenario are errors', () => {
        const report = runScenarios(engine, [base], { maxResolutions: 1 });
        expect(report.errors).toBe(1);
        expect(report.results[0].error?.code).toBe('SATURATION_LIMIT');
    });
});
