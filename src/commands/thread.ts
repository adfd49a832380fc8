import chalk from "chalk";
import { Command } from "commander";
import { formatTimeAgo } from "@/lib/time";
import { handleCliError } from "@/utils/cli-error";
import { type GlobalOptions, formatMessageLine, openChatSift } from "./shared";

export const threadCommand = new Command("thread")
    .description("Show the parent and most recent replies of a thread")
    .argument("<threadId>", "Thread id (the parent message id)")
    .option("-c, --config <path>", "Path to config file")
    .action(async (threadId: string, options: GlobalOptions) => {
        try {
            const chatsift = await openChatSift(options);
            const context = await chatsift.getThreadContext(threadId);
            if (!context) {
                console.log(chalk.yellow(`No messages in thread ${threadId}`));
                return;
            }

            console.log(chalk.bold(`Thread ${threadId} (${context.totalMessageCount} message(s))`));
            console.log(
                context.parentMessage
                    ? formatMessageLine(context.parentMessage)
                    : chalk.gray("(parent message not captured)")
            );
            for (const message of context.recentMessages) {
                console.log(`  ${formatMessageLine(message)}`);
            }
            const latest = context.recentMessages.at(-1);
            if (latest) {
                console.log(chalk.gray(`Last reply ${formatTimeAgo(latest.timestamp)}`));
            }
        } catch (error) {
            handleCliError(error, "Failed to load thread");
        }
    });
