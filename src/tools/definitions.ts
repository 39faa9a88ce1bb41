import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (verdict and rule ids), 'standard' (default), 'detailed' (derivation trace and statistics)",
};

const factsSchema = {
    type: 'object',
    additionalProperties: { type: 'boolean' },
    description: 'Proposition name → truth value, e.g. { "Integration_Work_Expo": true, "Station_Open_Expo": true }',
};

const modeSchema = {
    type: 'string',
    description: "Operating mode, e.g. 'today' or 'future'. Defaults to the configured mode.",
};

export const TOOLS: Tool[] = [
    {
        name: 'check-consistency',
        description: `Check whether a set of facts is consistent with the rules active in a mode.

**When to use:** Validate a reported network state against the operational rules.
**Result:** consistent, or inconsistent with the violated rule ids and the facts involved.

**Example:**
  facts: { "Integration_Work_Expo": true, "Station_Open_Expo": true }
  mode: "today"
  → Returns: { consistent: false, violatedRuleIds: ["R2"] }`,
        inputSchema: {
            type: 'object',
            properties: {
                facts: factsSchema,
                mode: modeSchema,
                with_model: {
                    type: 'boolean',
                    description: 'Attach a satisfying assignment to consistent verdicts. Default: false.',
                },
                include_trace: {
                    type: 'boolean',
                    description: 'Reconstruct the derivation of a refutation (shown at detailed verbosity). Default: true.',
                },
                max_clauses: {
                    type: 'integer',
                    description: 'Abort when the clause set grows past this size.',
                },
                max_resolutions: {
                    type: 'integer',
                    description: 'Abort after this many resolution attempts.',
                },
                verbosity: verbositySchema,
            },
            required: ['facts'],
        },
    },
    {
        name: 'entails',
        description: `Check whether the facts, with the rules active in a mode, force a literal.

**When to use:** Ask what must hold given the facts (e.g. is Expo closed?).
**Note:** inconsistent facts entail every literal; run check-consistency first.

**Example:**
  facts: { "Integration_Work_Expo": true }
  query: "-Station_Open_Expo"
  → Returns: { entailed: true, supportingRuleIds: ["R2"] }`,
        inputSchema: {
            type: 'object',
            properties: {
                facts: factsSchema,
                query: {
                    type: 'string',
                    description: "Literal to test: 'P', '-P' or '¬P'",
                },
                mode: modeSchema,
                verbosity: verbositySchema,
            },
            required: ['facts', 'query'],
        },
    },
    {
        name: 'derive-consequences',
        description: `List every literal not given in the facts that the facts entail in a mode.

Fails with UNSATISFIABLE when the facts are inconsistent.`,
        inputSchema: {
            type: 'object',
            properties: {
                facts: factsSchema,
                mode: modeSchema,
            },
            required: ['facts'],
        },
    },
    {
        name: 'list-rules',
        description: 'List the rules of the loaded rulebook, optionally only those active in a mode, with their clause form.',
        inputSchema: {
            type: 'object',
            properties: {
                mode: modeSchema,
            },
        },
    },
    {
        name: 'get-rule',
        description: 'Look up one rule by id.',
        inputSchema: {
            type: 'object',
            properties: {
                id: {
                    type: 'string',
                    description: "Rule id, e.g. 'R3'",
                },
            },
            required: ['id'],
        },
    },
    {
        name: 'run-scenarios',
        description: `Run scenarios against the rulebook and report which pass.

Without arguments, runs the scenarios bundled with the default rulebook.`,
        inputSchema: {
            type: 'object',
            properties: {
                scenarios: {
                    type: 'array',
                    description: 'Scenarios to run instead of the bundled ones',
                    items: {
                        type: 'object',
                        properties: {
                            id: { type: 'string' },
                            description: { type: 'string' },
                            mode: { type: 'string' },
                            facts: factsSchema,
                            expected: { type: 'string', enum: ['valid', 'invalid'] },
                            violatedRules: { type: 'array', items: { type: 'string' } },
                        },
                        required: ['id', 'mode', 'facts', 'expected'],
                    },
                },
            },
        },
    },
];
