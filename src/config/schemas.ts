/**
 * zod schemas for rulebook and scenario files
 */

import { z, ZodError } from 'zod';
import { createConfigurationError, ConfigurationError } from '../types/errors.js';

const nonEmpty = z.string().trim().min(1);

const RuleHeaderSchema = z.object({
    id: nonEmpty.describe('Stable rule identifier'),
    english: z.string().describe('Natural-language description'),
    modes: z.array(nonEmpty).optional().describe('Modes the rule applies to; omit for every mode'),
});

export const FormulaRuleSchema = RuleHeaderSchema.extend({
    formula: nonEmpty.describe("Implication such as 'A & B -> -C'"),
}).strict();

export const ImplicationRuleSchema = RuleHeaderSchema.extend({
    antecedents: z.array(z.string()).min(1),
    consequent: z.string(),
}).strict();

export const RuleSchema = z.union([FormulaRuleSchema, ImplicationRuleSchema]);

export const RulebookSchema = z.object({
    name: z.string().optional(),
    modes: z.array(nonEmpty).optional(),
    rules: z.array(RuleSchema),
});

export const FactsSchema = z.record(z.boolean());

export const ScenarioSchema = z.object({
    id: nonEmpty,
    description: z.string().default(''),
    mode: nonEmpty,
    facts: FactsSchema,
    expected: z.enum(['valid', 'invalid']),
    violatedRules: z.array(nonEmpty).optional(),
});

export const ScenarioFileSchema = z.object({
    scenarios: z.array(ScenarioSchema),
});

export type RulebookFile = z.infer<typeof RulebookSchema>;
export type ScenarioFile = z.infer<typeof ScenarioFileSchema>;

/**
 * Parse a value against a schema, turning zod issues into a ConfigurationError.
 */
export function parseWithSchema<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw fromZodError(result.error, what);
    }
    return result.data;
}

export function fromZodError(error: ZodError, what: string): ConfigurationError {
    const issues = error.issues.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
    }));
    const first = issues[0];
    return createConfigurationError(
        `Invalid ${what}${first ? `: ${first.path}: ${first.message}` : ''}`,
        { issues }
    );
}
