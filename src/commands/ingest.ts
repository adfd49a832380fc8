import { Command } from "commander";
import { handleCliError } from "@/utils/cli-error";
import { logger } from "@/utils/logger";
import { type GlobalOptions, openChatSift, readMessageFile } from "./shared";

export const ingestCommand = new Command("ingest")
    .description("Ingest messages from a JSON file (an array of captured messages)")
    .argument("<file>", "Path to the JSON file")
    .option("-c, --config <path>", "Path to config file")
    .action(async (file: string, options: GlobalOptions) => {
        try {
            const inputs = await readMessageFile(file);
            const chatsift = await openChatSift(options);
            const stats = await chatsift.ingestBatch(inputs);
            await chatsift.flush();

            logger.success(`Processed ${stats.totalProcessed} message(s)`);
            logger.info(`  New: ${stats.newMessages}`);
            logger.info(`  Duplicates: ${stats.duplicates}`);
            logger.info(`  Updated: ${stats.updates}`);
            logger.info(`  Reaction updates: ${stats.reactionUpdates}`);
            if (stats.failed > 0) {
                logger.warn(`  Failed: ${stats.failed}`);
                for (const failure of stats.errors) {
                    logger.warn(`    ${failure.messageId}: ${failure.error}`);
                }
            }
        } catch (error) {
            handleCliError(error, "Ingestion failed");
        }
    });
