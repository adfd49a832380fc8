import { Command } from "commander";
import { chunksCommand } from "./commands/chunks";
import { ingestCommand } from "./commands/ingest";
import { mcpCommand } from "./commands/mcp";
import { meaningCommand } from "./commands/meaning";
import { searchCommand } from "./commands/search";
import { statsCommand } from "./commands/stats";
import { threadCommand } from "./commands/thread";

export function createProgram(): Command {
    return new Command()
        .name("chatsift")
        .description("Contextual hybrid search over captured chat messages")
        .version("0.1.0")
        .addCommand(ingestCommand)
        .addCommand(searchCommand)
        .addCommand(threadCommand)
        .addCommand(meaningCommand)
        .addCommand(chunksCommand)
        .addCommand(statsCommand)
        .addCommand(mcpCommand);
}
