/**
 * Rulebook MCP Server
 *
 * MCP server exposing consistency checks and entailment over the loaded
 * rulebook: check-consistency, entails, derive-consequences, list-rules,
 * get-rule and run-scenarios.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import {
    LogicException,
    createInvalidArgumentsError,
    serializeLogicError,
} from './types/index.js';
import * as Handlers from './handlers/core.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';

export const SERVER_NAME = 'rulebook-resolver';
export const SERVER_VERSION = '1.0.0';

type ProgressCallback = (progress: number | undefined, message: string) => void;

type ToolHandler = (
    args: unknown,
    container: ServerContainer,
    options: { onProgress?: ProgressCallback }
) => unknown;

export const toolHandlers: Record<string, ToolHandler> = {
    'check-consistency': (args, c, opts) =>
        Handlers.checkConsistencyHandler(Handlers.parseArgs(Handlers.CheckConsistencyArgs, args), c, opts.onProgress),

    'entails': (args, c, opts) =>
        Handlers.entailsHandler(Handlers.parseArgs(Handlers.EntailsArgs, args), c, opts.onProgress),

    'derive-consequences': (args, c) =>
        Handlers.deriveConsequencesHandler(Handlers.parseArgs(Handlers.DeriveConsequencesArgs, args), c),

    'list-rules': (args, c) =>
        Handlers.listRulesHandler(Handlers.parseArgs(Handlers.ListRulesArgs, args), c),

    'get-rule': (args, c) =>
        Handlers.getRuleHandler(Handlers.parseArgs(Handlers.GetRuleArgs, args), c),

    'run-scenarios': (args, c) =>
        Handlers.runScenariosHandler(Handlers.parseArgs(Handlers.RunScenariosArgs, args), c),
};

export interface ToolCallResult {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

/**
 * Run a tool by name. Logic errors become error results; anything else is a bug
 * and is reported with its type.
 */
export function callTool(
    name: string,
    args: unknown,
    container: ServerContainer,
    onProgress?: ProgressCallback
): ToolCallResult {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createInvalidArgumentsError(`Unknown tool: ${name}`, { tools: Object.keys(toolHandlers) });
        }

        const result = handler(args, container, { onProgress });
        return {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        };
    } catch (error) {
        // Handle structured LogicException
        if (error instanceof LogicException) {
            return {
                content: [{ type: 'text', text: JSON.stringify(serializeLogicError(error.error), null, 2) }],
                isError: true,
            };
        }

        // Handle generic errors
        console.error(`Tool ${name} failed:`, error);
        const errorMessage = error instanceof Error ? error.message : String(error);
        return {
            content: [{
                type: 'text',
                text: JSON.stringify({
                    error: errorMessage,
                    type: error instanceof Error ? error.constructor.name : 'Error',
                }),
            }],
            isError: true,
        };
    }
}

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;

        // Progress is only reported to clients that asked for it
        const progressToken = request.params._meta?.progressToken;
        const onProgress: ProgressCallback | undefined = progressToken === undefined
            ? undefined
            : (progress, message) => {
                if (progress === undefined) return;
                server.notification({
                    method: 'notifications/progress',
                    params: { progressToken, progress, total: 1, message },
                }).catch((error: unknown) => {
                    console.error('Failed to send progress notification:', error);
                });
            };

        return callTool(name, args ?? {}, container, onProgress);
    });

    return server;
}

/**
 * Run the MCP server
 */
export async function runServer(container?: ServerContainer): Promise<void> {
    const server = createServer(container);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`${SERVER_NAME} ${SERVER_VERSION} running on stdio`);
}
