/**
 * Core Logic Modules
 *
 * Centralizes exports for propositions, clauses, rules and fact sets.
 */

export * from './proposition.js';
export * from './clause.js';
export * from './rule.js';
export * from './facts.js';
