import chalk from "chalk";
import { Command } from "commander";
import { format } from "date-fns";
import { parseDateArgument } from "@/lib/time";
import { serializeStats } from "@/tools/registry";
import { handleCliError } from "@/utils/cli-error";
import { type GlobalOptions, openChatSift, parsePositiveInt } from "./shared";

interface StatsCommandOptions extends GlobalOptions {
    since?: string;
    until?: string;
    top?: number;
    json?: boolean;
}

export const statsCommand = new Command("stats")
    .description("Summarize ingested messages: totals, date span, top keywords, senders and channels")
    .option("--since <date>", "Earliest timestamp (ISO 8601 or Unix seconds)")
    .option("--until <date>", "Latest timestamp (ISO 8601 or Unix seconds)")
    .option("--top <n>", "Entries per ranking", parsePositiveInt)
    .option("--json", "Print the summary as JSON")
    .option("-c, --config <path>", "Path to config file")
    .action(async (options: StatsCommandOptions) => {
        try {
            const chatsift = await openChatSift(options);
            const stats = await chatsift.getConversationStats(
                {
                    start: options.since ? parseDateArgument(options.since) : undefined,
                    end: options.until ? parseDateArgument(options.until) : undefined,
                },
                options.top
            );

            if (options.json) {
                console.log(JSON.stringify(serializeStats(stats), null, 2));
                return;
            }

            console.log(chalk.bold(`${stats.totalMessages} message(s), ${stats.uniqueKeywords} distinct keyword(s)`));
            if (stats.dateRange) {
                const span = `${format(stats.dateRange.earliest, "yyyy-MM-dd HH:mm")} to ${format(stats.dateRange.latest, "yyyy-MM-dd HH:mm")}`;
                console.log(chalk.gray(span));
            }
            const rankings: Array<[string, Array<{ name: string; count: number }>]> = [
                ["Keywords", stats.topKeywords.map((entry) => ({ name: entry.keyword, count: entry.count }))],
                ["Senders", stats.topSenders.map((entry) => ({ name: entry.sender, count: entry.count }))],
                ["Channels", stats.topChannels.map((entry) => ({ name: `#${entry.channel}`, count: entry.count }))],
            ];
            for (const [title, entries] of rankings) {
                if (entries.length === 0) continue;
                console.log(chalk.cyan(title));
                for (const entry of entries) {
                    console.log(`  ${entry.name} ${chalk.gray(`(${entry.count})`)}`);
                }
            }
        } catch (error) {
            handleCliError(error, "Failed to compute stats");
        }
    });
