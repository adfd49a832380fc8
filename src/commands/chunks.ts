import chalk from "chalk";
import { Command } from "commander";
import { format } from "date-fns";
import { handleCliError } from "@/utils/cli-error";
import { type GlobalOptions, openChatSift, parsePositiveInt, readMessageFile } from "./shared";

interface ChunksCommandOptions extends GlobalOptions {
    window?: number;
    maxSize?: number;
}

export const chunksCommand = new Command("chunks")
    .description("Group messages from a JSON file into conversation chunks")
    .argument("<file>", "Path to a JSON array of messages")
    .option("-w, --window <seconds>", "Maximum span of one chunk in seconds", parsePositiveInt)
    .option("-m, --max-size <n>", "Maximum messages per chunk", parsePositiveInt)
    .option("-c, --config <path>", "Path to config file")
    .action(async (file: string, options: ChunksCommandOptions) => {
        try {
            const inputs = await readMessageFile(file);
            const chatsift = await openChatSift(options);
            const messages = inputs.map((input) => chatsift.toMessage(input));
            const chunks = chatsift.createChunks(
                messages,
                options.window === undefined ? undefined : options.window * 1000,
                options.maxSize
            );

            for (const chunk of chunks) {
                const start = format(chunk.timeWindow.start, "yyyy-MM-dd HH:mm");
                const end = format(chunk.timeWindow.end, "HH:mm");
                console.log(`${chalk.bold(chunk.topic)} ${chalk.gray(`${start}-${end}`)}`);
                console.log(`  ${chunk.summary}`);
            }
        } catch (error) {
            handleCliError(error, "Chunking failed");
        }
    });
