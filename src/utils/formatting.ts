/**
 * Formatting utilities
 */
import type { DerivationStep, EntailmentResult, KnowledgeBaseSummary, Rule, Verdict } from '../types/index.js';
import type { KnowledgeBase } from '../knowledgeBase.js';
import { clauseToString } from '../logic/clause.js';
import { propositionToString } from '../logic/proposition.js';
import { ruleToString } from '../logic/rule.js';

/**
 * Format one step of a derivation: `[5] □  (resolve 2, 4 on A)`.
 */
export function formatDerivationStep(step: DerivationStep): string {
    return `[${step.id}] ${clauseToString(step.clause)}  (${describeOrigin(step)})`;
}

function describeOrigin(step: DerivationStep): string {
    const origin = step.origin;
    switch (origin.kind) {
        case 'rule': return `rule ${origin.ruleId}`;
        case 'fact': return 'fact';
        case 'query': return 'negated query';
        case 'resolvent': return `resolve ${step.parents.join(', ')} on ${origin.pivot}`;
    }
}

export function formatTrace(steps: readonly DerivationStep[]): string[] {
    return steps.map(formatDerivationStep);
}

export function formatRules(rules: readonly Rule[]): string {
    return rules.map(rule => `${ruleToString(rule)}\n    ${rule.english}`).join('\n');
}

/**
 * Format a verdict as text. Violated rules are listed with their description.
 */
export function formatVerdict<M extends string>(verdict: Verdict<M>, kb: KnowledgeBase<M>): string {
    const lines: string[] = [];
    lines.push(`${verdict.consistent ? 'CONSISTENT' : 'INCONSISTENT'} (mode: ${verdict.mode})`);

    if (!verdict.consistent) {
        lines.push('Violated rules:');
        for (const id of verdict.violatedRuleIds) {
            const rule = kb.rule(id);
            lines.push(`  ${ruleToString(rule)}`);
            lines.push(`    ${rule.english}`);
        }
        lines.push(`Contradictory facts: ${verdict.contradictoryPropositions.map(propositionToString).join(', ') || '(none)'}`);
        if (verdict.derivationTrace.length > 0) {
            lines.push('Derivation:');
            lines.push(...formatTrace(verdict.derivationTrace).map(line => `  ${line}`));
        }
    }

    if (verdict.model) {
        const assignment = Object.entries(verdict.model).map(([name, value]) => `${name}=${value}`);
        lines.push(`Model: ${assignment.join(', ') || '(empty)'}`);
    }

    return lines.join('\n');
}

export function formatEntailment<M extends string>(result: EntailmentResult<M>): string {
    const query = propositionToString(result.query);
    const lines = [`${result.entailed ? 'ENTAILED' : 'NOT ENTAILED'}: ${query} (mode: ${result.mode})`];
    if (result.entailed) {
        lines.push(`Supporting rules: ${result.supportingRuleIds.join(', ') || '(none)'}`);
        lines.push(`Supporting facts: ${result.supportingFacts.map(propositionToString).join(', ') || '(none)'}`);
        if (result.derivationTrace.length > 0) {
            lines.push('Derivation:');
            lines.push(...formatTrace(result.derivationTrace).map(line => `  ${line}`));
        }
    }
    return lines.join('\n');
}

/**
 * Rule counts: `mrt-operations: 14 rules (9 in every mode)` then one line per mode.
 */
export function formatSummary<M extends string>(name: string, summary: KnowledgeBaseSummary<M>): string {
    const lines = [`${name}: ${summary.total} rules (${summary.modeIndependent} in every mode)`];
    for (const { mode, count } of summary.byMode) {
        lines.push(`  ${mode}: ${count} active`);
    }
    return lines.join('\n');
}
