/**
 * Tests for the knowledge base
 */

import { createKnowledgeBase } from '../src/knowledgeBase.js';
import { ConfigurationError, NotFoundError } from '../src/types/errors.js';
import { defaultRulebook, createKnowledgeBaseFromRulebook } from '../src/config/index.js';

describe('KnowledgeBase', () => {
    const kb = createKnowledgeBase<string>([
        { id: 'R1', english: 'a', formula: 'A -> B' },
        { id: 'R2', english: 'b', formula: 'B -> C', modes: ['future'] },
        { id: 'R3', english: 'c', formula: 'C -> D', modes: ['today'] },
    ], { modes: ['today', 'future'] });

    test('keeps declaration order', () => {
        expect(kb.allRules().map(r => r.id)).toEqual(['R1', 'R2', 'R3']);
        expect(kb.count()).toBe(3);
    });

    test('looks up rules by id', () => {
        expect(kb.rule('R2').english).toBe('b');
        expect(kb.has('R9')).toBe(false);
    });

    test('unknown ids throw NotFoundError', () => {
        expect(() => kb.rule('R9')).toThrow(NotFoundError);
        expect(() => kb.rule('R9')).toThrow("Rule 'R9' not found");
    });

    test('filters by mode, keeping mode-independent rules', () => {
        expect(kb.rulesForMode('today').map(r => r.id)).toEqual(['R1', 'R3']);
        expect(kb.rulesForMode('future').map(r => r.id)).toEqual(['R1', 'R2']);
    });

    test('rejects an undeclared mode', () => {
        expect(() => kb.rulesForMode('past')).toThrow("Unknown mode 'past'");
    });

    test('vocabulary per mode', () => {
        expect(kb.vocabulary()).toEqual(['A', 'B', 'C', 'D']);
        expect(kb.vocabulary('future')).toEqual(['A', 'B', 'C']);
    });

    test('summary counts rules per mode', () => {
        expect(kb.summary()).toEqual({
            total: 3,
            modeIndependent: 1,
            byMode: [{ mode: 'today', count: 2 }, { mode: 'future', count: 2 }],
        });
    });

    test('declared modes default to the modes the rules name', () => {
        const implicit = createKnowledgeBase<string>([
            { id: 'R1', english: '', formula: 'A -> B', modes: ['future'] },
            { id: 'R2', english: '', formula: 'B -> C', modes: ['today', 'future'] },
        ]);
        expect(implicit.modes()).toEqual(['future', 'today']);
    });

    test('a knowledge base without modes accepts any mode', () => {
        const modeless = createKnowledgeBase<string>([{ id: 'R1', english: '', formula: 'A -> B' }]);
        expect(modeless.rulesForMode('anything')).toHaveLength(1);
    });
});

describe('KnowledgeBase validation', () => {
    test('rejects duplicate ids', () => {
        expect(() => createKnowledgeBase<string>([
            { id: 'R1', english: '', formula: 'A -> B' },
            { id: 'R1', english: '', formula: 'B -> C' },
        ])).toThrow("Duplicate rule id 'R1'");
    });

    test('rejects rules naming undeclared modes', () => {
        expect(() => createKnowledgeBase<string>(
            [{ id: 'R1', english: '', formula: 'A -> B', modes: ['past'] }],
            { modes: ['today'] }
        )).toThrow(ConfigurationError);
    });

    test('rejects blank mode names', () => {
        expect(() => createKnowledgeBase<string>([], { modes: [' '] })).toThrow('Mode names cannot be empty');
    });
});

describe('Default rulebook', () => {
    const kb = createKnowledgeBaseFromRulebook(defaultRulebook());

    test('loads the MRT rules', () => {
        expect(kb.name).toBe('mrt-operations');
        expect(kb.modes()).toEqual(['today', 'future']);
        expect(kb.allRules().map(r => r.id)).toEqual([
            'R1', 'R2', 'R3', 'R4', 'R5', 'R6', 'R7', 'R8', 'R9', 'R10', 'R11', 'R12', 'R13', 'R14',
        ]);
    });

    test('counts rules per mode', () => {
        expect(kb.summary()).toEqual({
            total: 14,
            modeIndependent: 9,
            byMode: [{ mode: 'today', count: 10 }, { mode: 'future', count: 13 }],
        });
    });

    test('future-only rules are scoped', () => {
        expect(kb.rule('R3').applicableModes).toEqual(['future']);
        expect(kb.rulesForMode('today').map(r => r.id)).not.toContain('R3');
    });
});
