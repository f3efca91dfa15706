#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createRuntime } from '../../bootstrap';
import { CONFIG } from '../../config/config';
import { Logger } from '../../core/logging/Logger';
import { OrderToolHandlers, toolDefinitions } from './handlers';

const runtime = createRuntime();
const handlers = new OrderToolHandlers(runtime.orchestrator);

// Create MCP Server with explicit capabilities
const server = new Server(
    {
        name: CONFIG.SERVER.NAME,
        version: CONFIG.SERVER.VERSION
    },
    {
        capabilities: {
            tools: {},
        },
    }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
        tools: toolDefinitions.map(tool => ({
            name: tool.name,
            description: tool.description,
            inputSchema: tool.inputSchema
        }))
    };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handlers.handle(name, args ?? {});
});

// Error handling
server.onerror = (error: Error) => {
    Logger.error('MCP', "[MCP Server Error]", error);
};

// Graceful Shutdown
let shuttingDown = false;
const cleanup = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    Logger.info('MCP', 'Shutting down gracefully...');
    try {
        await server.close();
        await runtime.shutdown();
        process.exit(0);
    } catch (error) {
        Logger.error('MCP', 'Shutdown failed', error);
        process.exit(1);
    }
};
process.on('SIGINT', () => { void cleanup(); });
process.on('SIGTERM', () => { void cleanup(); });

// Start Server
async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    runtime.recoveryWorker.start(CONFIG.WORKFLOW.RECOVERY_INTERVAL_MS);
    Logger.info('MCP', `${CONFIG.SERVER.NAME} MCP server running on stdio`);
}

main().catch((error) => {
    Logger.error('MCP', "Fatal error in main():", error);
    process.exit(1);
});
