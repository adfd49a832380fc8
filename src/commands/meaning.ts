import chalk from "chalk";
import { Command } from "commander";
import { handleCliError } from "@/utils/cli-error";
import { type GlobalOptions, openChatSift } from "./shared";

export const meaningCommand = new Command("meaning")
    .description("Explain what a short message means in its thread")
    .argument("<messageId>", "Id of a stored message")
    .option("-c, --config <path>", "Path to config file")
    .action(async (messageId: string, options: GlobalOptions) => {
        try {
            const chatsift = await openChatSift(options);
            const meaning = await chatsift.getContextualMeaning(messageId);
            console.log(meaning ?? chalk.gray("(no contextual meaning)"));
        } catch (error) {
            handleCliError(error, "Failed to interpret message");
        }
    });
