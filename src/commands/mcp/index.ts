import { Command } from "commander";
import { serveCommand } from "./serve";

export const mcpCommand = new Command("mcp").description("Model Context Protocol (MCP) server").addCommand(serveCommand);
