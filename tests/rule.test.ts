/**
 * Tests for rules and their CNF clauses
 */

import { createRule, ruleToClause, ruleToString, appliesToMode, rulePropositionNames } from '../src/logic/rule.js';
import { clauseToString } from '../src/logic/clause.js';
import { ConfigurationError, LogicException } from '../src/types/errors.js';
import type { Rule } from '../src/types/rule.js';

describe('createRule', () => {
    test('builds a rule from antecedents and consequent', () => {
        const rule = createRule({ id: 'R1', english: 'A and B give C', antecedents: ['A', '-B'], consequent: 'C' });
        expect(rule.antecedents).toEqual([{ name: 'A', negated: false }, { name: 'B', negated: true }]);
        expect(rule.consequent).toEqual({ name: 'C', negated: false });
        expect(rule.applicableModes).toEqual([]);
    });

    test('builds a rule from a formula', () => {
        const rule = createRule({ id: 'R2', english: '', formula: 'Integration_Work_Expo -> -Station_Open_Expo' });
        expect(rule.antecedents).toEqual([{ name: 'Integration_Work_Expo', negated: false }]);
        expect(rule.consequent).toEqual({ name: 'Station_Open_Expo', negated: true });
    });

    test('accepts proposition objects', () => {
        const rule = createRule({
            id: 'R3',
            english: '',
            antecedents: [{ name: 'A', negated: true }],
            consequent: { name: 'B', negated: false },
        });
        expect(ruleToString(rule)).toBe('R3: (¬A) → B');
    });

    test('trims the id and dedupes modes', () => {
        const rule = createRule({ id: ' R4 ', english: '', formula: 'A -> B', modes: ['future', 'future', 'today'] });
        expect(rule.id).toBe('R4');
        expect(rule.applicableModes).toEqual(['future', 'today']);
    });

    test('rules are frozen', () => {
        const rule = createRule({ id: 'R5', english: '', formula: 'A -> B' });
        expect(Object.isFrozen(rule)).toBe(true);
        expect(Object.isFrozen(rule.antecedents)).toBe(true);
        expect(Object.isFrozen(rule.applicableModes)).toBe(true);
    });

    test('rejects a blank id', () => {
        expect(() => createRule({ id: '  ', english: 'x', formula: 'A -> B' })).toThrow(ConfigurationError);
    });

    test('rejects empty antecedents', () => {
        expect(() => createRule({ id: 'R6', english: '', antecedents: [], consequent: 'B' }))
            .toThrow("Rule 'R6' has no antecedents");
    });

    test('rejects a blank proposition name', () => {
        expect(() => createRule({
            id: 'R7',
            english: '',
            antecedents: [{ name: ' ', negated: false }],
            consequent: 'B',
        })).toThrow("Rule 'R7' has a blank proposition name");
    });

    test('wraps formula parse errors in a configuration error', () => {
        try {
            createRule({ id: 'R8', english: '', formula: 'A ->' });
            throw new Error('expected a configuration error');
        } catch (e) {
            expect(e).toBeInstanceOf(ConfigurationError);
            if (!(e instanceof LogicException)) throw e;
            expect(e.code).toBe('CONFIGURATION_ERROR');
            expect(e.message).toBe("Rule 'R8' is malformed: Expected IDENT but reached end of input");
            expect(e.error.details?.ruleId).toBe('R8');
            expect(e.error.suggestion).toContain('missing consequent');
        }
    });
});

describe('Rule helpers', () => {
    const rule: Rule = createRule({ id: 'R', english: '', antecedents: ['A', 'B'], consequent: 'C', modes: ['future'] });

    test('CNF clause negates every antecedent', () => {
        expect(clauseToString(ruleToClause(rule))).toBe('¬A ∨ ¬B ∨ C');
    });

    test('formats rules in logical notation', () => {
        expect(ruleToString(rule)).toBe('R: (A ∧ B) → C [future]');
    });

    test('mode applicability', () => {
        const everyMode = createRule({ id: 'E', english: '', formula: 'A -> B' });
        expect(appliesToMode(rule, 'future')).toBe(true);
        expect(appliesToMode(rule, 'today')).toBe(false);
        expect(appliesToMode(everyMode, 'today')).toBe(true);
    });

    test('proposition names, antecedents first', () => {
        const repeated = createRule({ id: 'X', english: '', formula: 'B & A -> -B' });
        expect(rulePropositionNames(repeated)).toEqual(['B', 'A']);
    });
});
