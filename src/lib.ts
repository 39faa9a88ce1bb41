/**
 * Rulebook Resolver - Library Entry Point
 *
 * Exports the core functionality of the library for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Knowledge base and engine
export { KnowledgeBase, createKnowledgeBase } from './knowledgeBase.js';
export type { KnowledgeBaseOptions } from './knowledgeBase.js';
export { ResolutionEngine, createResolutionEngine } from './engines/resolution/index.js';
export type { ClauseUniverse } from './engines/resolution/index.js';
export { solveClauses } from './engines/sat.js';
export type { SatResult } from './engines/sat.js';

// Propositions, clauses, rules and facts
export * from './logic/index.js';

// Parser
export { parseImplication, parseLiteral } from './parser/index.js';

// Rulebooks, scenarios and configuration
export {
    parseRulebook,
    loadRulebook,
    defaultRulebook,
    createKnowledgeBaseFromRulebook,
    parseScenarios,
    loadScenarios,
    defaultScenarios,
    readFactsFile,
    loadConfig,
} from './config/index.js';
export type { Rulebook, RulebookConfig } from './config/index.js';
export { runScenarios, runScenario } from './scenarios.js';
export type { Scenario, ScenarioResult, ScenarioReport, ScenarioStatus } from './scenarios.js';

// Output
export * from './utils/formatting.js';
export { buildVerdictResponse, buildEntailmentResponse } from './utils/response.js';

// Types and Interfaces
export * from './types/index.js';
