/**
 * Rules in implication form and their CNF view.
 *
 *   (A ∧ B ∧ C) → D
 *   ≡ ¬(A ∧ B ∧ C) ∨ D
 *   ≡ ¬A ∨ ¬B ∨ ¬C ∨ D
 */

import type { Clause, Proposition } from '../types/clause.js';
import type { LiteralInput, Rule, RuleDefinition } from '../types/rule.js';
import { createConfigurationError, LogicException } from '../types/errors.js';
import { parseImplication, parseLiteral } from '../parser/index.js';
import { createClause } from './clause.js';
import { createProposition, negate, propositionToString } from './proposition.js';

/**
 * Build an immutable rule from its definition.
 * Throws ConfigurationError for a blank id, empty antecedents or malformed literals.
 */
export function createRule<M extends string>(definition: RuleDefinition<M>): Rule<M> {
    const id = definition.id.trim();
    if (!id) {
        throw createConfigurationError('Rule id cannot be empty', { english: definition.english });
    }

    const { antecedents, consequent } = readImplication(id, definition);
    if (antecedents.length === 0) {
        throw createConfigurationError(
            `Rule '${id}' has no antecedents`,
            { ruleId: id },
            'Every rule needs at least one condition: (P1 ∧ … ∧ Pn) → Q'
        );
    }
    if ([...antecedents, consequent].some(p => !p.name.trim())) {
        throw createConfigurationError(`Rule '${id}' has a blank proposition name`, { ruleId: id });
    }

    const modes = definition.modes ?? [];
    return Object.freeze({
        id,
        english: definition.english,
        antecedents: Object.freeze(antecedents),
        consequent,
        applicableModes: Object.freeze([...new Set(modes)]),
    });
}

function readImplication<M extends string>(
    id: string,
    definition: RuleDefinition<M>
): { antecedents: Proposition[]; consequent: Proposition } {
    try {
        if ('formula' in definition) {
            return parseImplication(definition.formula);
        }
        return {
            antecedents: definition.antecedents.map(toProposition),
            consequent: toProposition(definition.consequent),
        };
    } catch (e) {
        if (e instanceof LogicException && e.code === 'PARSE_ERROR') {
            throw createConfigurationError(
                `Rule '${id}' is malformed: ${e.message}`,
                { ruleId: id, parseError: e.error },
                e.error.suggestion
            );
        }
        throw e;
    }
}

function toProposition(input: LiteralInput): Proposition {
    return typeof input === 'string'
        ? parseLiteral(input)
        : createProposition(input.name, input.negated);
}

/**
 * Convert a rule to its CNF clause: every antecedent negated, the consequent as is.
 */
export function ruleToClause(rule: Rule<string>): Clause {
    return createClause([...rule.antecedents.map(negate), rule.consequent]);
}

/**
 * A rule applies when the mode is listed, or always when it lists no modes.
 */
export function appliesToMode<M extends string>(rule: Rule<M>, mode: M): boolean {
    return rule.applicableModes.length === 0 || rule.applicableModes.includes(mode);
}

/**
 * Distinct proposition names of a rule, antecedents first.
 */
export function rulePropositionNames(rule: Rule<string>): string[] {
    return [...new Set([...rule.antecedents, rule.consequent].map(p => p.name))];
}

/**
 * Format a rule in logical notation: `R1: (A ∧ B) → C [future]`.
 */
export function ruleToString(rule: Rule<string>): string {
    const antecedent = rule.antecedents.map(propositionToString).join(' ∧ ');
    const modes = rule.applicableModes.length > 0 ? ` [${rule.applicableModes.join(', ')}]` : '';
    return `${rule.id}: (${antecedent}) → ${propositionToString(rule.consequent)}${modes}`;
}
