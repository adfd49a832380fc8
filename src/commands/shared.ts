import chalk from "chalk";
import { format } from "date-fns";
import { ChatSift } from "@/ChatSift";
import { readJsonFile, resolvePath } from "@/lib/fs";
import type { Message } from "@/messages/types";
import { ConfigService } from "@/services/ConfigService";
import { logger } from "@/utils/logger";

export interface GlobalOptions {
    config?: string;
}

export async function openChatSift(options: GlobalOptions): Promise<ChatSift> {
    const config = await new ConfigService().loadConfig(options.config);
    if (config.logging.logFile) {
        logger.initFileLogging(resolvePath(config.logging.logFile));
    }
    return ChatSift.open(config);
}

/**
 * Read a JSON file holding an array of raw messages
 */
export async function readMessageFile(filePath: string): Promise<unknown[]> {
    const data = await readJsonFile(resolvePath(filePath));
    if (data === null) {
        throw new Error(`File not found: ${filePath}`);
    }
    if (!Array.isArray(data)) {
        throw new Error(`${filePath} must contain a JSON array of messages`);
    }
    return data;
}

export function formatMessageLine(message: Message): string {
    const when = chalk.gray(format(message.timestamp, "yyyy-MM-dd HH:mm"));
    const where = chalk.cyan(`#${message.channel}`);
    return `${when} ${where} ${chalk.bold(message.sender)}: ${message.content}`;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`Expected a positive integer, got "${value}"`);
    }
    return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}
