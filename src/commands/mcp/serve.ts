/**
 * ChatSift MCP Server - exposes the engine's operations as MCP tools over stdio
 *
 * Logging goes to stderr (and the log file when configured) so stdout carries
 * protocol traffic only.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
    CallToolRequestSchema,
    type CallToolResult,
    ListToolsRequestSchema,
    type Tool as MCPTool,
} from "@modelcontextprotocol/sdk/types.js";
import { Command } from "commander";
import { ChatSift } from "@/ChatSift";
import { ConfigService } from "@/services/ConfigService";
import { type ChatSiftTool, type ToolName, type ToolRegistry, createToolRegistry, listTools } from "@/tools/registry";
import { zodToJsonSchema } from "@/tools/zod-schema";
import { formatAnyError, formatToolError } from "@/lib/error-formatter";
import { exitCodeFor, handleCliError } from "@/utils/cli-error";
import { logger } from "@/utils/logger";

export const SERVER_NAME = "chatsift";
export const SERVER_VERSION = "0.1.0";

export function toMCPTool(tool: ChatSiftTool): MCPTool {
    return {
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
    };
}

function isToolName(registry: ToolRegistry, name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(registry, name);
}

/**
 * Run one tools/call request against the registry
 */
export async function callTool(registry: ToolRegistry, name: string, args: unknown): Promise<CallToolResult> {
    if (!isToolName(registry, name)) {
        return {
            content: [{ type: "text", text: `Tool ${name} not found` }],
            isError: true,
        };
    }

    logger.info(`[ChatSiftMCP] Executing tool: ${name}`);
    const result = await registry[name].execute(args);
    if (!result.ok) {
        return {
            content: [{ type: "text", text: formatToolError(result.error) }],
            isError: true,
        };
    }
    return {
        content: [{ type: "text", text: JSON.stringify(result.data, null, 2) }],
    };
}

export function createServer(registry: ToolRegistry): Server {
    const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });
    const mcpTools = listTools(registry).map(toMCPTool);

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: mcpTools }));
    server.setRequestHandler(CallToolRequestSchema, async (request) =>
        callTool(registry, request.params.name, request.params.arguments)
    );
    return server;
}

/**
 * Flush then close, once however many exit paths fire. Clients usually stop a
 * stdio server by closing its stdin, so this runs on transport close as well
 * as on signals.
 */
export function createShutdown(
    chatsift: Pick<ChatSift, "flush">,
    server: Pick<Server, "close">,
    exit: (code: number) => void = (code) => process.exit(code)
): () => Promise<void> {
    let pending: Promise<void> | null = null;

    const run = async (): Promise<void> => {
        logger.info("[ChatSiftMCP] Shutting down");
        try {
            await chatsift.flush();
            await server.close();
        } catch (error) {
            logger.error(`Failed to shut down cleanly: ${formatAnyError(error)}`);
            exit(exitCodeFor(error));
            return;
        }
        exit(0);
    };

    return () => {
        if (!pending) {
            pending = run();
        }
        return pending;
    };
}

/**
 * Start the MCP server
 */
export async function startServer(configPath?: string): Promise<void> {
    logger.useStderr();
    const config = await new ConfigService().loadConfig(configPath);
    if (config.logging.logFile) {
        logger.initFileLogging(config.logging.logFile);
    }

    const chatsift = await ChatSift.open(config);
    const registry = createToolRegistry(chatsift);
    const server = createServer(registry);

    const shutdown = createShutdown(chatsift, server);
    server.onclose = () => void shutdown();
    process.stdin.once("end", () => void shutdown());
    process.on("SIGINT", () => void shutdown());
    process.on("SIGTERM", () => void shutdown());

    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info(`[ChatSiftMCP] Server started with ${listTools(registry).length} tools`);
}

export const serveCommand = new Command("serve")
    .description("Serve ChatSift tools over MCP (stdio)")
    .option("-c, --config <path>", "Path to config file")
    .action(async (options: { config?: string }) => {
        try {
            await startServer(options.config);
        } catch (error) {
            handleCliError(error, "Failed to start MCP server");
        }
    });
