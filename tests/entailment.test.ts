/**
 * Tests for entailment by refutation and derived consequences
 */

import { engineFor, RULES } from './fixtures.js';
import { createProposition } from '../src/logic/proposition.js';
import { LogicException } from '../src/types/errors.js';
import { createResolutionEngine } from '../src/engines/resolution/index.js';
import { defaultRulebook, createKnowledgeBaseFromRulebook } from '../src/config/index.js';

const A = createProposition('A');
const B = createProposition('B');
const notB = createProposition('B', true);
const C = createProposition('C');
const Q = createProposition('Q');

describe('entails', () => {
    const engine = engineFor(RULES.chain);

    test('a rule carries its antecedent to its consequent', () => {
        expect(engine.entails({ A: true }, 'today', B)).toBe(true);
    });

    test('chains of rules', () => {
        expect(engine.entails({ A: true }, 'today', C)).toBe(true);
    });

    test('no entailment without support', () => {
        expect(engine.entails({}, 'today', B)).toBe(false);
        expect(engine.entails({ A: true }, 'today', notB)).toBe(false);
    });

    test('contrapositive', () => {
        expect(engine.entails({ C: false }, 'today', createProposition('A', true))).toBe(true);
    });

    test('a fact entails itself', () => {
        expect(engine.entails({ Q: true }, 'today', Q)).toBe(true);
    });

    test('inconsistent facts entail anything', () => {
        expect(engineFor(RULES.opposed).entails({ A: true }, 'today', Q)).toBe(true);
    });

    test('respects mode scoping', () => {
        const scoped = engineFor(RULES.futureOnly);
        expect(scoped.entails({ A: true }, 'today', B)).toBe(false);
        expect(scoped.entails({ A: true }, 'future', B)).toBe(true);
    });
});

describe('prove', () => {
    test('reports the rules and facts of the refutation', () => {
        const result = engineFor(RULES.chain).prove({ A: true }, 'today', C);
        expect(result.entailed).toBe(true);
        expect(result.query).toEqual(C);
        expect(result.supportingRuleIds).toEqual(['R1', 'R2']);
        expect(result.supportingFacts).toEqual([A]);
        expect(result.derivationTrace[result.derivationTrace.length - 1].clause.propositions).toEqual([]);
    });

    test('the negated query is an input of the derivation', () => {
        const result = engineFor(RULES.chain).prove({ A: true }, 'today', B);
        const queries = result.derivationTrace.filter(step => step.origin.kind === 'query');
        expect(queries.map(step => step.clause.propositions)).toEqual([[notB]]);
    });

    test('failed proofs carry no support', () => {
        const result = engineFor(RULES.chain).prove({}, 'today', C);
        expect(result.entailed).toBe(false);
        expect(result.supportingRuleIds).toEqual([]);
        expect(result.derivationTrace).toEqual([]);
    });
});

describe('deriveConsequences', () => {
    test('lists forced literals in vocabulary order', () => {
        expect(engineFor(RULES.chain).deriveConsequences({ A: true }, 'today')).toEqual([B, C]);
    });

    test('includes negative consequences', () => {
        expect(engineFor(RULES.chain).deriveConsequences({ C: false }, 'today')).toEqual([
            createProposition('A', true),
            notB,
        ]);
    });

    test('nothing follows from nothing', () => {
        expect(engineFor(RULES.chain).deriveConsequences({}, 'today')).toEqual([]);
    });

    test('inconsistent facts are rejected', () => {
        try {
            engineFor(RULES.opposed).deriveConsequences({ A: true }, 'today');
            throw new Error('expected an unsatisfiable error');
        } catch (e) {
            if (!(e instanceof LogicException)) throw e;
            expect(e.code).toBe('UNSATISFIABLE');
            expect(e.error.details).toEqual({ mode: 'today', violatedRuleIds: ['R1', 'R2'] });
        }
    });
});

describe('MRT rulebook entailment', () => {
    const engine = createResolutionEngine(createKnowledgeBaseFromRulebook(defaultRulebook()));
    const works = { Integration_Work_Expo: true };

    test('integration works close Expo', () => {
        expect(engine.entails(works, 'today', createProposition('Station_Open_Expo', true))).toBe(true);
    });

    test('and rule out transfers there', () => {
        const result = engine.prove(works, 'today', createProposition('Transfer_Available_Expo', true));
        expect(result.entailed).toBe(true);
        expect(result.supportingRuleIds).toEqual(['R2', 'R6']);
        expect(result.supportingFacts).toEqual([createProposition('Integration_Work_Expo')]);
    });

    test('derives both consequences', () => {
        expect(engine.deriveConsequences(works, 'today')).toEqual([
            createProposition('Station_Open_Expo', true),
            createProposition('Transfer_Available_Expo', true),
        ]);
    });

    test('the future network forces the TEL route to the airport', () => {
        const facts = { Network_Mode_Future: true, Destination_Changi_Airport: true };
        expect(engine.entails(facts, 'future', createProposition('Route_Uses_TEL'))).toBe(true);
        expect(engine.entails(facts, 'today', createProposition('Route_Uses_TEL'))).toBe(false);
    });
});
