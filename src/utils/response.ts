import type {
    Verbosity,
    Verdict,
    VerdictResponse,
    MinimalVerdictResponse,
    StandardVerdictResponse,
    DetailedVerdictResponse,
    EntailmentResult,
    EntailmentResponse,
    MinimalEntailmentResponse,
    StandardEntailmentResponse,
    DetailedEntailmentResponse,
} from '../types/index.js';
import type { KnowledgeBase } from '../knowledgeBase.js';
import { propositionToString } from '../logic/proposition.js';
import { formatTrace } from './formatting.js';

/**
 * Build a verdict response based on verbosity level
 */
export function buildVerdictResponse<M extends string>(
    verdict: Verdict<M>,
    kb: KnowledgeBase<M>,
    verbosity: Verbosity = 'standard'
): VerdictResponse {
    const minimal: MinimalVerdictResponse = {
        consistent: verdict.consistent,
        result: verdict.consistent ? 'consistent' : 'inconsistent',
        violatedRuleIds: verdict.violatedRuleIds,
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardVerdictResponse = {
        ...minimal,
        mode: verdict.mode,
        message: verdict.consistent
            ? `Facts are consistent with the rules active in mode '${verdict.mode}'`
            : `Facts violate ${verdict.violatedRuleIds.length} rule(s) active in mode '${verdict.mode}'`,
        violatedRules: verdict.violatedRuleIds.map(id => ({ id, english: kb.rule(id).english })),
        contradictoryPropositions: verdict.contradictoryPropositions.map(propositionToString),
        ...(verdict.model && { model: verdict.model }),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedVerdictResponse = {
        ...standard,
        derivationTrace: formatTrace(verdict.derivationTrace),
        excludedRuleIds: verdict.excludedRuleIds,
        statistics: verdict.statistics,
    };
    return detailed;
}

/**
 * Build an entailment response based on verbosity level
 */
export function buildEntailmentResponse<M extends string>(
    result: EntailmentResult<M>,
    verbosity: Verbosity = 'standard'
): EntailmentResponse {
    const query = propositionToString(result.query);
    const minimal: MinimalEntailmentResponse = { entailed: result.entailed, query };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardEntailmentResponse = {
        ...minimal,
        mode: result.mode,
        message: result.entailed
            ? `${query} follows from the facts in mode '${result.mode}'`
            : `${query} does not follow from the facts in mode '${result.mode}'`,
        supportingRuleIds: result.supportingRuleIds,
    };
    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedEntailmentResponse = {
        ...standard,
        supportingFacts: result.supportingFacts.map(propositionToString),
        derivationTrace: formatTrace(result.derivationTrace),
        statistics: result.statistics,
    };
    return detailed;
}
