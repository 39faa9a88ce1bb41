/**
 * Rulebook and scenario loading
 *
 * Rulebooks are JSON files `{ name?, modes?, rules: [...] }`. Each rule is
 * written either with `antecedents` and `consequent` or as a `formula`.
 */

import { readFileSync } from 'fs';
import defaultRulebookJson from '../../data/mrt-rules.json';
import defaultScenariosJson from '../../data/mrt-scenarios.json';
import type { RuleDefinition } from '../types/rule.js';
import { createConfigurationError } from '../types/errors.js';
import { KnowledgeBase } from '../knowledgeBase.js';
import type { Scenario } from '../scenarios.js';
import { FactsSchema, parseWithSchema, RulebookFile, RulebookSchema, ScenarioFileSchema } from './schemas.js';

export interface Rulebook {
    name: string;
    modes: string[];
    rules: RuleDefinition[];
}

/**
 * Validate an already-parsed rulebook value.
 */
export function parseRulebook(value: unknown, fallbackName: string = 'rulebook'): Rulebook {
    const file: RulebookFile = parseWithSchema(RulebookSchema, value, 'rulebook');
    return {
        name: file.name ?? fallbackName,
        modes: file.modes ?? [],
        rules: file.rules,
    };
}

/**
 * Read and validate a rulebook file.
 */
export function loadRulebook(path: string): Rulebook {
    return parseRulebook(readJsonFile(path, 'rulebook'), path);
}

/**
 * The bundled MRT operations rulebook.
 */
export function defaultRulebook(): Rulebook {
    return parseRulebook(defaultRulebookJson, 'mrt-operations');
}

/**
 * Build a knowledge base from a rulebook. A rulebook that declares no modes
 * takes the modes its rules name.
 */
export function createKnowledgeBaseFromRulebook(rulebook: Rulebook): KnowledgeBase {
    return new KnowledgeBase(rulebook.rules, {
        name: rulebook.name,
        modes: rulebook.modes.length > 0 ? rulebook.modes : undefined,
    });
}

export function parseScenarios(value: unknown): Scenario[] {
    return parseWithSchema(ScenarioFileSchema, value, 'scenario file').scenarios;
}

export function loadScenarios(path: string): Scenario[] {
    return parseScenarios(readJsonFile(path, 'scenario file'));
}

/**
 * Scenarios for the bundled rulebook.
 */
export function defaultScenarios(): Scenario[] {
    return parseScenarios(defaultScenariosJson);
}

/**
 * Read a facts file: a JSON object of proposition name → boolean.
 */
export function readFactsFile(path: string): Record<string, boolean> {
    return parseWithSchema(FactsSchema, readJsonFile(path, 'facts file'), 'facts file');
}

function readJsonFile(path: string, what: string): unknown {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (e) {
        throw createConfigurationError(
            `Cannot read ${what} '${path}': ${e instanceof Error ? e.message : String(e)}`,
            { path }
        );
    }

    try {
        return JSON.parse(text);
    } catch (e) {
        throw createConfigurationError(
            `${what} '${path}' is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
            { path }
        );
    }
}
