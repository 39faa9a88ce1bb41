/**
 * Tests for text formatting
 */

import { engineFor, RULES } from './fixtures.js';
import { createProposition } from '../src/logic/proposition.js';
import { formatEntailment, formatRules, formatSummary, formatVerdict } from '../src/utils/formatting.js';
import { defaultRulebook, createKnowledgeBaseFromRulebook } from '../src/config/index.js';

describe('formatVerdict', () => {
    const engine = engineFor(RULES.opposed);

    test('inconsistent verdicts list rules, facts and the derivation', () => {
        const verdict = engine.checkConsistency({ A: true }, 'today');
        expect(formatVerdict(verdict, engine.knowledgeBase)).toBe([
            'INCONSISTENT (mode: today)',
            'Violated rules:',
            '  R1: (A) → B',
            '    A gives B',
            '  R2: (A) → ¬B',
            '    A denies B',
            'Contradictory facts: A',
            'Derivation:',
            '  [0] ¬A ∨ B  (rule R1)',
            '  [1] ¬A ∨ ¬B  (rule R2)',
            '  [2] A  (fact)',
            '  [3] ¬A  (resolve 0, 1 on B)',
            '  [6] □  (resolve 2, 3 on A)',
        ].join('\n'));
    });

    test('without a trace the derivation is left out', () => {
        const verdict = engine.checkConsistency({ A: true }, 'today', { includeTrace: false });
        expect(formatVerdict(verdict, engine.knowledgeBase).split('\n').pop()).toBe('Contradictory facts: A');
    });

    test('consistent verdicts show the model', () => {
        const verdict = engineFor(RULES.chain).checkConsistency({ A: true }, 'today', { withModel: true });
        expect(formatVerdict(verdict, engineFor(RULES.chain).knowledgeBase)).toBe(
            'CONSISTENT (mode: today)\nModel: A=true, B=true, C=true'
        );
    });
});

describe('formatEntailment', () => {
    const engine = engineFor(RULES.chain);

    test('entailed queries name their support', () => {
        const lines = formatEntailment(engine.prove({ A: true }, 'today', createProposition('B'))).split('\n');
        expect(lines.slice(0, 3)).toEqual([
            'ENTAILED: B (mode: today)',
            'Supporting rules: R1',
            'Supporting facts: A',
        ]);
        expect(lines[3]).toBe('Derivation:');
    });

    test('queries that do not follow are one line', () => {
        expect(formatEntailment(engine.prove({}, 'today', createProposition('B', true))))
            .toBe('NOT ENTAILED: ¬B (mode: today)');
    });
});

describe('formatRules and formatSummary', () => {
    test('rules with their descriptions', () => {
        const kb = engineFor(RULES.futureOnly).knowledgeBase;
        expect(formatRules(kb.allRules())).toBe('F: (A) → B [future]\n    A gives B in the future');
    });

    test('summary of the bundled rulebook', () => {
        const kb = createKnowledgeBaseFromRulebook(defaultRulebook());
        expect(formatSummary(kb.name, kb.summary())).toBe([
            'mrt-operations: 14 rules (9 in every mode)',
            '  today: 10 active',
            '  future: 13 active',
        ].join('\n'));
    });
});
