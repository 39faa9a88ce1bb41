import { z } from 'zod';
import type {
    VerdictResponse,
    EntailmentResponse,
    KnowledgeBaseSummary,
    LogicError,
} from '../types/index.js';
import { createInvalidArgumentsError } from '../types/index.js';
import type { ServerContainer } from '../container.js';
import { FactsSchema, ScenarioSchema } from '../config/schemas.js';
import { parseLiteral } from '../parser/index.js';
import { propositionToString } from '../logic/proposition.js';
import { clauseToString } from '../logic/clause.js';
import { ruleToClause, ruleToString } from '../logic/rule.js';
import type { Rule } from '../types/rule.js';
import { runScenarios, ScenarioStatus } from '../scenarios.js';
import { buildEntailmentResponse, buildVerdictResponse } from '../utils/response.js';

type ProgressCallback = (progress: number | undefined, message: string) => void;

const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard');

export const CheckConsistencyArgs = z.object({
    facts: FactsSchema,
    mode: z.string().optional(),
    with_model: z.boolean().optional(),
    include_trace: z.boolean().optional(),
    max_clauses: z.number().int().positive().optional(),
    max_resolutions: z.number().int().positive().optional(),
    verbosity: verbositySchema,
});

export const EntailsArgs = z.object({
    facts: FactsSchema,
    query: z.string(),
    mode: z.string().optional(),
    verbosity: verbositySchema,
});

export const DeriveConsequencesArgs = z.object({
    facts: FactsSchema,
    mode: z.string().optional(),
});

export const ListRulesArgs = z.object({
    mode: z.string().optional(),
});

export const GetRuleArgs = z.object({
    id: z.string(),
});

export const RunScenariosArgs = z.object({
    scenarios: z.array(ScenarioSchema).optional(),
});

/**
 * Validate tool arguments. Throws INVALID_ARGUMENTS naming the first bad field.
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            path: issue.path.join('.') || '(root)',
            message: issue.message,
        }));
        const first = issues[0];
        throw createInvalidArgumentsError(
            first ? `Invalid argument ${first.path}: ${first.message}` : 'Invalid arguments',
            { issues }
        );
    }
    return result.data;
}

export function checkConsistencyHandler(
    args: z.output<typeof CheckConsistencyArgs>,
    container: ServerContainer,
    onProgress?: ProgressCallback
): VerdictResponse {
    const mode = args.mode ?? container.config.defaultMode;
    const verdict = container.engine.checkConsistency(args.facts, mode, {
        withModel: args.with_model,
        includeTrace: args.include_trace,
        maxClauses: args.max_clauses,
        maxResolutions: args.max_resolutions,
        onProgress,
    });
    return buildVerdictResponse(verdict, container.knowledgeBase, args.verbosity);
}

export function entailsHandler(
    args: z.output<typeof EntailsArgs>,
    container: ServerContainer,
    onProgress?: ProgressCallback
): EntailmentResponse {
    const mode = args.mode ?? container.config.defaultMode;
    const result = container.engine.prove(args.facts, mode, parseLiteral(args.query), { onProgress });
    return buildEntailmentResponse(result, args.verbosity);
}

export function deriveConsequencesHandler(
    args: z.output<typeof DeriveConsequencesArgs>,
    container: ServerContainer
): { mode: string; consequences: string[] } {
    const mode = args.mode ?? container.config.defaultMode;
    const consequences = container.engine.deriveConsequences(args.facts, mode);
    return { mode, consequences: consequences.map(propositionToString) };
}

export interface RuleView {
    id: string;
    english: string;
    notation: string;
    clause: string;
    modes: string[];
}

function viewRule(rule: Rule): RuleView {
    return {
        id: rule.id,
        english: rule.english,
        notation: ruleToString(rule),
        clause: clauseToString(ruleToClause(rule)),
        modes: [...rule.applicableModes],
    };
}

export function listRulesHandler(
    args: z.output<typeof ListRulesArgs>,
    container: ServerContainer
): { name: string; modes: string[]; summary: KnowledgeBaseSummary; rules: RuleView[] } {
    const kb = container.knowledgeBase;
    const rules = args.mode === undefined ? kb.allRules() : kb.rulesForMode(args.mode);
    return {
        name: kb.name,
        modes: [...kb.modes()],
        summary: kb.summary(),
        rules: rules.map(viewRule),
    };
}

export function getRuleHandler(
    args: z.output<typeof GetRuleArgs>,
    container: ServerContainer
): RuleView {
    return viewRule(container.knowledgeBase.rule(args.id));
}

export interface ScenarioOutcome {
    id: string;
    description: string;
    mode: string;
    expected: 'valid' | 'invalid';
    status: ScenarioStatus;
    consistent?: boolean;
    violatedRuleIds?: string[];
    missingRules: string[];
    error?: LogicError;
}

export function runScenariosHandler(
    args: z.output<typeof RunScenariosArgs>,
    container: ServerContainer
): { total: number; passed: number; failed: number; errors: number; results: ScenarioOutcome[] } {
    const report = runScenarios(container.engine, args.scenarios ?? container.scenarios);
    return {
        total: report.total,
        passed: report.passed,
        failed: report.failed,
        errors: report.errors,
        results: report.results.map(result => ({
            id: result.scenario.id,
            description: result.scenario.description,
            mode: result.scenario.mode,
            expected: result.scenario.expected,
            status: result.status,
            ...(result.verdict && {
                consistent: result.verdict.consistent,
                violatedRuleIds: result.verdict.violatedRuleIds,
            }),
            missingRules: result.missingRules,
            ...(result.error && { error: result.error }),
        })),
    };
}
