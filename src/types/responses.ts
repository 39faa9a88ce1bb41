/**
 * Result and response types
 */

import type { DerivationStep, Proposition } from './clause.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface RunStatistics {
    /** Clauses created during the run, inputs included */
    clauses: number;
    /** Resolution attempts between complementary clauses */
    resolutions: number;
    timeMs: number;
}

/**
 * Outcome of a consistency check.
 */
export interface Verdict<M extends string = string> {
    consistent: boolean;
    mode: M;
    /** Rules on the refutation or falsified by the facts, in declaration order */
    violatedRuleIds: string[];
    /** Facts those rules conflict with, duplicate-free, in canonical order */
    contradictoryPropositions: Proposition[];
    /** Ancestors of the empty clause in creation order; empty when consistent */
    derivationTrace: DerivationStep[];
    /** Applicable rules whose clause is a tautology and took no part */
    excludedRuleIds: string[];
    statistics: RunStatistics;
    /** Satisfying assignment, present on consistent verdicts when requested */
    model?: Record<string, boolean>;
}

/**
 * Outcome of an entailment query with its refutation.
 */
export interface EntailmentResult<M extends string = string> {
    entailed: boolean;
    mode: M;
    query: Proposition;
    /** Rules the refutation of the negated query relied on */
    supportingRuleIds: string[];
    /** Facts the refutation relied on */
    supportingFacts: Proposition[];
    derivationTrace: DerivationStep[];
    statistics: RunStatistics;
}

/**
 * Minimal verdict response - just the verdict and the rule ids
 */
export interface MinimalVerdictResponse {
    consistent: boolean;
    result: 'consistent' | 'inconsistent';
    violatedRuleIds: string[];
}

/**
 * Standard verdict response - adds rule descriptions and facts
 */
export interface StandardVerdictResponse extends MinimalVerdictResponse {
    mode: string;
    message: string;
    violatedRules: Array<{ id: string; english: string }>;
    contradictoryPropositions: string[];
    model?: Record<string, boolean>;
}

/**
 * Detailed verdict response - adds the derivation and statistics
 */
export interface DetailedVerdictResponse extends StandardVerdictResponse {
    derivationTrace: string[];
    excludedRuleIds: string[];
    statistics: RunStatistics;
}

/**
 * Union type for verdict responses
 */
export type VerdictResponse = MinimalVerdictResponse | StandardVerdictResponse | DetailedVerdictResponse;

export interface MinimalEntailmentResponse {
    entailed: boolean;
    query: string;
}

export interface StandardEntailmentResponse extends MinimalEntailmentResponse {
    mode: string;
    message: string;
    supportingRuleIds: string[];
}

export interface DetailedEntailmentResponse extends StandardEntailmentResponse {
    supportingFacts: string[];
    derivationTrace: string[];
    statistics: RunStatistics;
}

export type EntailmentResponse = MinimalEntailmentResponse | StandardEntailmentResponse | DetailedEntailmentResponse;
