#!/usr/bin/env node
/**
 * Rulebook MCP server entry point.
 */

import 'dotenv/config';
import { runServer, SERVER_NAME, SERVER_VERSION } from './server.js';
import { createContainer } from './container.js';
import { LogicException, serializeLogicError } from './types/index.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
${SERVER_NAME} - consistency checking over operational rulebooks

Usage: rulebook-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - check-consistency    Check facts against the rules of a mode
  - entails              Test whether the facts force a literal
  - derive-consequences  List every literal the facts force
  - list-rules           List rules, optionally for one mode
  - get-rule             Look up a rule by id
  - run-scenarios        Run the bundled or given scenarios

Environment:
  RULEBOOK_PATH             Rulebook JSON file (default: bundled MRT rulebook)
  RULEBOOK_MODE             Default mode (default: today)
  RULEBOOK_MAX_CLAUSES      Clause bound per query
  RULEBOOK_MAX_RESOLUTIONS  Resolution bound per query

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`${SERVER_NAME} version ${SERVER_VERSION}`);
        process.exit(0);
    }

    try {
        await runServer(createContainer());
    } catch (error) {
        if (error instanceof LogicException) {
            console.error('Failed to start server:', JSON.stringify(serializeLogicError(error.error)));
        } else {
            console.error('Failed to start server:', error);
        }
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
