#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import chalk from 'chalk';
import boxen from 'boxen';
import { createContainer, ServerContainer } from './container.js';
import { loadConfig, loadScenarios, readFactsFile } from './config/index.js';
import { parseLiteral } from './parser/index.js';
import { propositionToString } from './logic/proposition.js';
import { LogicException, createInvalidArgumentsError, serializeLogicError, Verdict } from './types/index.js';
import { runScenarios, ScenarioReport } from './scenarios.js';
import { formatEntailment, formatRules, formatSummary, formatVerdict } from './utils/formatting.js';

const VERSION = '1.0.0';
const HELP = `
Rulebook CLI v${VERSION}

Usage:
  rulebook rules                        List rules (of one mode with --mode)
  rulebook check <facts.json>           Check facts for consistency
  rulebook entails <facts.json> <lit>   Test whether the facts force a literal
  rulebook derive <facts.json>          List every literal the facts force
  rulebook scenarios [file.json]        Run scenarios (bundled ones by default)
  rulebook repl                         Interactive mode

Options:
  --rules=<file>     Rulebook JSON file (default: RULEBOOK_PATH or the bundled MRT rulebook)
  --mode=<mode>      Operating mode (default: RULEBOOK_MODE or today)
  --model            Show a satisfying assignment for consistent facts
  --trace            Show the derivation of a refutation
  --help, -h         Show this help
  --version, -v      Show version

Facts files map proposition names to true or false:
  { "Integration_Work_Expo": true, "Station_Open_Expo": true }

Exit codes: 0 consistent / entailed / all scenarios pass, 2 otherwise, 1 on error.
`;

export interface CliArgs {
    command?: string;
    positional: string[];
    rules?: string;
    mode?: string;
    model: boolean;
    trace: boolean;
    help: boolean;
    version: boolean;
    /** Unrecognized `--` options */
    unknown: string[];
}

/**
 * Split argv into command, positional arguments and options.
 * `--rules` and `--mode` take a value either inline (`--mode=future`) or as the next argument.
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
    const parsed: CliArgs = { positional: [], model: false, trace: false, help: false, version: false, unknown: [] };
    const rest: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--rules=')) {
            parsed.rules = arg.slice('--rules='.length);
        } else if (arg.startsWith('--mode=')) {
            parsed.mode = arg.slice('--mode='.length);
        } else if ((arg === '--rules' || arg === '--mode') && i + 1 < args.length) {
            const value = args[++i];
            if (arg === '--rules') parsed.rules = value;
            else parsed.mode = value;
        } else if (arg === '--model') {
            parsed.model = true;
        } else if (arg === '--trace') {
            parsed.trace = true;
        } else if (arg === '--help' || arg === '-h') {
            parsed.help = true;
        } else if (arg === '--version' || arg === '-v') {
            parsed.version = true;
        } else if (arg.startsWith('--')) {
            parsed.unknown.push(arg);
        } else {
            // '-P' is a negative literal, not an option
            rest.push(arg);
        }
    }

    parsed.command = rest[0];
    parsed.positional = rest.slice(1);
    return parsed;
}

function headline(consistent: boolean, text: string): string {
    return boxen(consistent ? chalk.bold.green(text) : chalk.bold.red(text), {
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        borderColor: consistent ? 'green' : 'red',
    });
}

function printVerdict(verdict: Verdict, container: ServerContainer, trace: boolean): void {
    console.log(headline(verdict.consistent, verdict.consistent ? '✓ CONSISTENT' : '✗ INCONSISTENT'));
    const shown = trace ? verdict : { ...verdict, derivationTrace: [] };
    // The first line repeats the headline
    const body = formatVerdict(shown, container.knowledgeBase).split('\n').slice(1);
    if (body.length > 0) console.log(body.join('\n'));
    console.log(chalk.dim(`${verdict.statistics.clauses} clauses, ${verdict.statistics.resolutions} resolutions, ${verdict.statistics.timeMs}ms`));
}

function printScenarioReport(report: ScenarioReport): void {
    for (const result of report.results) {
        const { scenario } = result;
        const mark = result.status === 'pass' ? chalk.green('✓') : result.status === 'fail' ? chalk.red('✗') : chalk.yellow('!');
        console.log(`${mark} ${scenario.id} [${scenario.mode}] ${scenario.description}`);
        if (result.verdict && result.status === 'fail') {
            const actual = result.verdict.consistent ? 'valid' : `invalid (${result.verdict.violatedRuleIds.join(', ')})`;
            console.log(chalk.dim(`    expected ${scenario.expected}, got ${actual}`));
            if (result.missingRules.length > 0) {
                console.log(chalk.dim(`    missing violations: ${result.missingRules.join(', ')}`));
            }
        }
        if (result.error) {
            console.log(chalk.yellow(`    ${result.error.code}: ${result.error.message}`));
        }
    }
    const allPassed = report.passed === report.total;
    console.log(boxen(`${report.passed}/${report.total} passed, ${report.failed} failed, ${report.errors} errors`, {
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        borderColor: allPassed ? 'green' : 'red',
    }));
}

function requireArg(value: string | undefined, what: string): string {
    if (!value) {
        throw createInvalidArgumentsError(`${what} argument required`, { usage: 'rulebook --help' });
    }
    return value;
}

export function main(argv: readonly string[]): number {
    const args = parseCliArgs(argv);

    if (args.version) {
        console.log(VERSION);
        return 0;
    }
    if (args.help || !args.command) {
        console.log(HELP);
        return 0;
    }
    if (args.unknown.length > 0) {
        console.error(chalk.red(`Error: unknown option(s) ${args.unknown.join(', ')}`));
        return 1;
    }

    const config = loadConfig();
    const mode = args.mode ?? config.defaultMode;
    const container = createContainer({
        ...config,
        rulebookPath: args.rules ?? config.rulebookPath,
        defaultMode: mode,
    });
    const { engine, knowledgeBase } = container;

    switch (args.command) {
        case 'rules': {
            console.log(chalk.bold(formatSummary(knowledgeBase.name, knowledgeBase.summary())));
            const rules = args.mode ? knowledgeBase.rulesForMode(args.mode) : knowledgeBase.allRules();
            console.log(formatRules(rules));
            return 0;
        }
        case 'check': {
            const facts = readFactsFile(requireArg(args.positional[0], 'facts file'));
            const verdict = engine.checkConsistency(facts, mode, { withModel: args.model, includeTrace: args.trace });
            printVerdict(verdict, container, args.trace);
            return verdict.consistent ? 0 : 2;
        }
        case 'entails': {
            const facts = readFactsFile(requireArg(args.positional[0], 'facts file'));
            const query = parseLiteral(requireArg(args.positional[1], 'literal'));
            const result = engine.prove(facts, mode, query, { includeTrace: args.trace });
            const [first, ...body] = formatEntailment(result).split('\n');
            console.log(headline(result.entailed, first));
            if (body.length > 0) console.log(body.join('\n'));
            return result.entailed ? 0 : 2;
        }
        case 'derive': {
            const facts = readFactsFile(requireArg(args.positional[0], 'facts file'));
            const consequences = engine.deriveConsequences(facts, mode);
            console.log(chalk.bold(`Consequences in mode '${mode}':`));
            console.log(consequences.length > 0
                ? consequences.map(p => `  ${propositionToString(p)}`).join('\n')
                : chalk.dim('  (none)'));
            return 0;
        }
        case 'scenarios': {
            const file = args.positional[0];
            const scenarios = file ? loadScenarios(file) : container.scenarios;
            const report = runScenarios(engine, scenarios);
            printScenarioReport(report);
            return report.passed === report.total ? 0 : 2;
        }
        case 'repl':
            runRepl(container, mode);
            return 0;
        default:
            console.error(chalk.red(`Unknown command: ${args.command}`));
            console.log(HELP);
            return 1;
    }
}

function runRepl(container: ServerContainer, initialMode: string): void {
    const { engine, knowledgeBase } = container;
    const facts = new Map<string, boolean>();
    let mode = initialMode;

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'rulebook> ',
    });

    console.log(chalk.bold.blue(`Rulebook REPL v${VERSION}`));
    console.log(chalk.dim(`${knowledgeBase.name}: ${knowledgeBase.count()} rules, mode ${mode}`));
    console.log(chalk.gray('Commands: .fact <literal>, .check, .entails <literal>, .derive, .facts, .quit, .help\n'));
    rl.prompt();

    const handle = (trimmed: string): void => {
        if (trimmed === '.help') {
            console.log('Commands:');
            console.log('  .fact <literal>     Set a fact: P is true, -P is false');
            console.log('  .unset <name>       Remove a fact');
            console.log('  .mode [mode]        Show or switch the mode');
            console.log('  .check              Check the facts for consistency');
            console.log('  .entails <literal>  Test whether the facts force a literal');
            console.log('  .derive             List every literal the facts force');
            console.log('  .facts              List current facts');
            console.log('  .clear              Clear all facts');
            console.log('  .rules              List the rules active in the mode');
            console.log('  .quit, .exit, .q    Exit REPL');
            console.log('  .help               Show this help');
        } else if (trimmed.startsWith('.fact ')) {
            const literal = parseLiteral(trimmed.slice(6).trim());
            facts.set(literal.name, !literal.negated);
            console.log(chalk.green(`✓ ${propositionToString(literal)} (${facts.size} facts)`));
        } else if (trimmed.startsWith('.unset ')) {
            const name = trimmed.slice(7).trim();
            console.log(facts.delete(name) ? `Removed ${name}` : chalk.dim(`(no fact ${name})`));
        } else if (trimmed === '.mode') {
            console.log(`Mode: ${mode} (declared: ${knowledgeBase.modes().join(', ')})`);
        } else if (trimmed.startsWith('.mode ')) {
            const next = trimmed.slice(6).trim();
            knowledgeBase.assertMode(next);
            mode = next;
            console.log(`Mode: ${mode}`);
        } else if (trimmed === '.check') {
            printVerdict(engine.checkConsistency(facts, mode), container, true);
        } else if (trimmed.startsWith('.entails ')) {
            const result = engine.prove(facts, mode, parseLiteral(trimmed.slice(9).trim()));
            console.log(formatEntailment(result));
        } else if (trimmed === '.derive') {
            const consequences = engine.deriveConsequences(facts, mode);
            console.log(consequences.length > 0 ? consequences.map(propositionToString).join(', ') : '(none)');
        } else if (trimmed === '.facts') {
            if (facts.size === 0) {
                console.log('(no facts)');
            } else {
                for (const [name, value] of facts) console.log(`  ${name} = ${value}`);
            }
        } else if (trimmed === '.clear') {
            facts.clear();
            console.log('Cleared.');
        } else if (trimmed === '.rules') {
            console.log(formatRules(knowledgeBase.rulesForMode(mode)));
        } else if (trimmed) {
            console.log('Unknown command. Use .fact, .check, .entails, .derive, .facts, .clear, or .quit');
        }
    };

    rl.on('line', (line) => {
        const trimmed = line.trim();
        if (trimmed === '.quit' || trimmed === '.exit' || trimmed === '.q') {
            rl.close();
            return;
        }
        try {
            handle(trimmed);
        } catch (e) {
            if (!(e instanceof LogicException)) throw e;
            console.log(chalk.red(`✗ ${e.code}: ${e.message}`));
            if (e.error.suggestion) console.log(chalk.dim(`  ${e.error.suggestion}`));
        }
        rl.prompt();
    });

    rl.on('close', () => process.exit(0));
}

function reportError(error: unknown): void {
    if (error instanceof LogicException) {
        console.error(chalk.red(`Error: ${error.message}`));
        console.error(chalk.dim(JSON.stringify(serializeLogicError(error.error), null, 2)));
    } else {
        console.error(chalk.red('Error:'), error);
    }
}

if (require.main === module) {
    try {
        const code = main(process.argv.slice(2));
        // The REPL keeps the process alive and exits on close
        if (code !== 0) process.exit(code);
    } catch (error) {
        reportError(error);
        process.exit(1);
    }
}
