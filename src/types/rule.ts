/**
 * Rule Types
 */

import type { Proposition } from './clause.js';

/**
 * A literal as written by a rule author: `"A"`, `"-A"`, `"¬A"`, or a Proposition.
 */
export type LiteralInput = string | Proposition;

interface RuleHeader<M extends string> {
    /** Stable identifier, unique within a knowledge base */
    id: string;
    /** Natural-language description */
    english: string;
    /** Modes the rule applies to; empty or absent means every mode */
    modes?: readonly M[];
}

/**
 * Declarative rule definition, either as explicit antecedents and consequent
 * or as a formula such as `"A & B -> -C"`.
 */
export type RuleDefinition<M extends string = string> = RuleHeader<M> & (
    | { antecedents: readonly LiteralInput[]; consequent: LiteralInput }
    | { formula: string }
);

/**
 * An implication `(P1 ∧ … ∧ Pn) → Q`. Immutable once constructed.
 */
export interface Rule<M extends string = string> {
    readonly id: string;
    readonly english: string;
    readonly antecedents: readonly Proposition[];
    readonly consequent: Proposition;
    readonly applicableModes: readonly M[];
}

/**
 * Rule counts of a knowledge base.
 */
export interface KnowledgeBaseSummary<M extends string = string> {
    total: number;
    modeIndependent: number;
    byMode: Array<{ mode: M; count: number }>;
}
