/**
 * Knowledge Base
 *
 * An ordered, immutable collection of rules with lookups by id and by mode.
 */

import type { Rule, RuleDefinition, KnowledgeBaseSummary } from './types/rule.js';
import { createConfigurationError, createRuleNotFoundError } from './types/errors.js';
import { appliesToMode, createRule, rulePropositionNames } from './logic/rule.js';

export interface KnowledgeBaseOptions<M extends string> {
    /** Display name of the rulebook */
    name?: string;
    /**
     * Declared modes. Rules may only name declared modes, and lookups by an
     * undeclared mode fail. When omitted, the modes the rules name are declared.
     */
    modes?: readonly M[];
}

export class KnowledgeBase<M extends string = string> {
    readonly name: string;
    private readonly rules: readonly Rule<M>[];
    private readonly byId: ReadonlyMap<string, Rule<M>>;
    private readonly declaredModes: readonly M[];

    constructor(definitions: ReadonlyArray<RuleDefinition<M>>, options: KnowledgeBaseOptions<M> = {}) {
        this.name = options.name ?? 'rulebook';

        const rules = definitions.map(definition => createRule(definition));
        const byId = new Map<string, Rule<M>>();
        for (const rule of rules) {
            if (byId.has(rule.id)) {
                throw createConfigurationError(`Duplicate rule id '${rule.id}'`, { ruleId: rule.id });
            }
            byId.set(rule.id, rule);
        }

        const declared = options.modes
            ? [...new Set(options.modes)]
            : [...new Set(rules.flatMap(rule => rule.applicableModes))];
        if (declared.some(mode => !mode.trim())) {
            throw createConfigurationError('Mode names cannot be empty', { modes: declared });
        }
        for (const rule of rules) {
            const undeclared = rule.applicableModes.filter(mode => !declared.includes(mode));
            if (undeclared.length > 0) {
                throw createConfigurationError(
                    `Rule '${rule.id}' names undeclared mode(s): ${undeclared.join(', ')}`,
                    { ruleId: rule.id, undeclared, declared },
                    `Declare the mode or use one of: ${declared.join(', ') || '(none)'}`
                );
            }
        }

        this.rules = Object.freeze(rules);
        this.byId = byId;
        this.declaredModes = Object.freeze(declared);
    }

    /**
     * All rules in declaration order.
     */
    allRules(): readonly Rule<M>[] {
        return this.rules;
    }

    /**
     * Look up a rule by id. Throws NotFoundError for unknown ids.
     */
    rule(id: string): Rule<M> {
        const rule = this.byId.get(id);
        if (!rule) {
            throw createRuleNotFoundError(id, [...this.byId.keys()]);
        }
        return rule;
    }

    has(id: string): boolean {
        return this.byId.has(id);
    }

    /**
     * Rules applicable to a mode, in declaration order.
     * Mode-independent rules (no modes listed) are always included.
     */
    rulesForMode(mode: M): Rule<M>[] {
        this.assertMode(mode);
        return this.rules.filter(rule => appliesToMode(rule, mode));
    }

    count(): number {
        return this.rules.length;
    }

    modes(): readonly M[] {
        return this.declaredModes;
    }

    /**
     * Throws ConfigurationError when the mode is not declared.
     * A knowledge base without declared modes accepts any mode.
     */
    assertMode(mode: M): void {
        if (this.declaredModes.length > 0 && !this.declaredModes.includes(mode)) {
            throw createConfigurationError(
                `Unknown mode '${mode}'`,
                { mode, declared: this.declaredModes },
                `Use one of: ${this.declaredModes.join(', ')}`
            );
        }
    }

    /**
     * Distinct proposition names of the rules, restricted to a mode when given.
     */
    vocabulary(mode?: M): string[] {
        const rules = mode === undefined ? this.rules : this.rulesForMode(mode);
        return [...new Set(rules.flatMap(rulePropositionNames))];
    }

    summary(): KnowledgeBaseSummary<M> {
        return {
            total: this.rules.length,
            modeIndependent: this.rules.filter(rule => rule.applicableModes.length === 0).length,
            byMode: this.declaredModes.map(mode => ({ mode, count: this.rulesForMode(mode).length })),
        };
    }
}

/**
 * Create a knowledge base. Fails fast with ConfigurationError; no partial KB is built.
 */
export function createKnowledgeBase<M extends string = string>(
    definitions: ReadonlyArray<RuleDefinition<M>>,
    options?: KnowledgeBaseOptions<M>
): KnowledgeBase<M> {
    return new KnowledgeBase(definitions, options);
}
