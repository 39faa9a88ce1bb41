/**
 * Tests for verbosity control
 */

import { engineFor, RULES } from './fixtures.js';
import { createProposition } from '../src/logic/proposition.js';
import { buildEntailmentResponse, buildVerdictResponse } from '../src/utils/response.js';

describe('Verdict responses', () => {
    const engine = engineFor(RULES.opposed);
    const kb = engine.knowledgeBase;
    const inconsistent = engine.checkConsistency({ A: true }, 'today');

    test('minimal carries only the outcome', () => {
        expect(buildVerdictResponse(inconsistent, kb, 'minimal')).toEqual({
            consistent: false,
            result: 'inconsistent',
            violatedRuleIds: ['R1', 'R2'],
        });
    });

    test('standard describes the violated rules', () => {
        expect(buildVerdictResponse(inconsistent, kb)).toEqual({
            consistent: false,
            result: 'inconsistent',
            violatedRuleIds: ['R1', 'R2'],
            mode: 'today',
            message: "Facts violate 2 rule(s) active in mode 'today'",
            violatedRules: [{ id: 'R1', english: 'A gives B' }, { id: 'R2', english: 'A denies B' }],
            contradictoryPropositions: ['A'],
        });
    });

    test('detailed adds the derivation and statistics', () => {
        expect(buildVerdictResponse(inconsistent, kb, 'detailed')).toEqual({
            consistent: false,
            result: 'inconsistent',
            violatedRuleIds: ['R1', 'R2'],
            mode: 'today',
            message: "Facts violate 2 rule(s) active in mode 'today'",
            violatedRules: [{ id: 'R1', english: 'A gives B' }, { id: 'R2', english: 'A denies B' }],
            contradictoryPropositions: ['A'],
            derivationTrace: [
                '[0] ¬A ∨ B  (rule R1)',
                '[1] ¬A ∨ ¬B  (rule R2)',
                '[2] A  (fact)',
                '[3] ¬A  (resolve 0, 1 on B)',
                '[6] □  (resolve 2, 3 on A)',
            ],
            excludedRuleIds: [],
            statistics: inconsistent.statistics,
        });
    });

    test('consistent verdicts carry the model when one was asked for', () => {
        const verdict = engine.checkConsistency({ A: false }, 'today', { withModel: true });
        expect(buildVerdictResponse(verdict, kb)).toEqual({
            consistent: true,
            result: 'consistent',
            violatedRuleIds: [],
            mode: 'today',
            message: "Facts are consistent with the rules active in mode 'today'",
            violatedRules: [],
            contradictoryPropositions: [],
            model: verdict.model,
        });
    });
});

describe('Entailment responses', () => {
    const engine = engineFor(RULES.chain);
    const proved = engine.prove({ A: true }, 'today', createProposition('C'));
    const refused = engine.prove({}, 'today', createProposition('C', true));

    test('minimal', () => {
        expect(buildEntailmentResponse(proved, 'minimal')).toEqual({ entailed: true, query: 'C' });
    });

    test('standard', () => {
        expect(buildEntailmentResponse(proved)).toEqual({
            entailed: true,
            query: 'C',
            mode: 'today',
            message: "C follows from the facts in mode 'today'",
            supportingRuleIds: ['R1', 'R2'],
        });
        expect(buildEntailmentResponse(refused)).toEqual({
            entailed: false,
            query: '¬C',
            mode: 'today',
            message: "¬C does not follow from the facts in mode 'today'",
            supportingRuleIds: [],
        });
    });

    test('detailed', () => {
        const response = buildEntailmentResponse(proved, 'detailed');
        expect(response).toMatchObject({ supportingFacts: ['A'], statistics: proved.statistics });
        expect('derivationTrace' in response && response.derivationTrace).toHaveLength(proved.derivationTrace.length);
    });
});
