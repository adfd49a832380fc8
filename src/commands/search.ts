import chalk from "chalk";
import { Command } from "commander";
import { parseDateArgument } from "@/lib/time";
import type { SearchFilters } from "@/search/types";
import { serializeMessage } from "@/tools/registry";
import { handleCliError } from "@/utils/cli-error";
import { type GlobalOptions, collect, formatMessageLine, openChatSift, parsePositiveInt } from "./shared";

interface SearchCommandOptions extends GlobalOptions {
    limit?: number;
    channel?: string[];
    user?: string[];
    since?: string;
    until?: string;
    json?: boolean;
}

export function buildFilters(options: SearchCommandOptions): SearchFilters | undefined {
    const filters: SearchFilters = {};
    if (options.channel?.length) filters.channels = options.channel;
    if (options.user?.length) filters.users = options.user;
    if (options.since || options.until) {
        filters.dateRange = {
            start: options.since ? parseDateArgument(options.since) : undefined,
            end: options.until ? parseDateArgument(options.until) : undefined,
        };
    }
    return Object.keys(filters).length > 0 ? filters : undefined;
}

export const searchCommand = new Command("search")
    .description("Search ingested messages with a natural-language query")
    .argument("<query...>", "Query text, e.g. deployment issues from alice yesterday")
    .option("-l, --limit <n>", "Maximum number of results", parsePositiveInt)
    .option("--channel <name>", "Only this channel (repeatable)", collect)
    .option("--user <name>", "Only this sender (repeatable)", collect)
    .option("--since <date>", "Earliest timestamp (ISO 8601 or Unix seconds)")
    .option("--until <date>", "Latest timestamp (ISO 8601 or Unix seconds)")
    .option("--json", "Print results as JSON")
    .option("-c, --config <path>", "Path to config file")
    .action(async (queryWords: string[], options: SearchCommandOptions) => {
        try {
            const chatsift = await openChatSift(options);
            const response = await chatsift.search(queryWords.join(" "), {
                limit: options.limit,
                filters: buildFilters(options),
            });

            if (options.json) {
                const payload =
                    response.kind === "empty"
                        ? { results: [], guidance: response.guidance }
                        : {
                              results: response.results.map((result) => ({
                                  ...result,
                                  message: serializeMessage(result.message),
                              })),
                          };
                console.log(JSON.stringify(payload, null, 2));
                return;
            }

            if (response.kind === "empty") {
                console.log(chalk.yellow("No matching messages."));
                for (const line of response.guidance) {
                    console.log(`  - ${line}`);
                }
                return;
            }

            for (const result of response.results) {
                console.log(`${chalk.green(result.combinedScore.toFixed(3))} ${formatMessageLine(result.message)}`);
            }
        } catch (error) {
            handleCliError(error, "Search failed");
        }
    });
