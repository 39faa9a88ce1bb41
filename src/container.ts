import { KnowledgeBase } from './knowledgeBase.js';
import { ResolutionEngine, createResolutionEngine } from './engines/resolution/index.js';
import {
    RulebookConfig,
    Rulebook,
    loadConfig,
    loadRulebook,
    defaultRulebook,
    defaultScenarios,
    createKnowledgeBaseFromRulebook,
} from './config/index.js';
import type { Scenario } from './scenarios.js';

export interface ServerContainer {
    config: RulebookConfig;
    rulebook: Rulebook;
    knowledgeBase: KnowledgeBase;
    engine: ResolutionEngine;
    /** Scenarios of the bundled rulebook; empty for a custom rulebook */
    scenarios: Scenario[];
}

/**
 * Wire the knowledge base and engine from configuration. Fails fast with
 * ConfigurationError for a bad rulebook or an undeclared default mode.
 */
export function createContainer(config: RulebookConfig = loadConfig()): ServerContainer {
    const rulebook = config.rulebookPath ? loadRulebook(config.rulebookPath) : defaultRulebook();
    const knowledgeBase = createKnowledgeBaseFromRulebook(rulebook);
    knowledgeBase.assertMode(config.defaultMode);

    return {
        config,
        rulebook,
        knowledgeBase,
        engine: createResolutionEngine(knowledgeBase, config.limits),
        scenarios: config.rulebookPath ? [] : defaultScenarios(),
    };
}
