import fs from "node:fs";
import path from "node:path";
import chalk, { type ChalkInstance } from "chalk";

type Level = "error" | "warn" | "info" | "success" | "debug";

const thresholds: Record<string, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

// success prints at info verbosity
const levelThreshold: Record<Level, number> = {
    error: 1,
    warn: 2,
    info: 3,
    success: 3,
    debug: 4,
};

const styles: Record<Level, { color: ChalkInstance; emoji: string }> = {
    error: { color: chalk.red, emoji: "❌" },
    warn: { color: chalk.yellow, emoji: "⚠️" },
    info: { color: chalk.blue, emoji: "ℹ️" },
    success: { color: chalk.green, emoji: "✅" },
    debug: { color: chalk.gray, emoji: "🔍" },
};

/**
 * CHATSIFT_LOG_LEVEL (or LOG_LEVEL) picks the verbosity; DEBUG=true forces debug
 */
function currentThreshold(): number {
    if (process.env.DEBUG === "true") return thresholds.debug;
    const name = process.env.CHATSIFT_LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info";
    return thresholds[name] ?? thresholds.info;
}

let logFilePath: string | null = null;

// When set, console output goes to stderr so stdout stays free for protocol traffic
let stderrOnly = false;

function formatArg(arg: unknown): string {
    if (arg instanceof Error) return arg.stack ?? arg.message;
    return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function writeToFile(level: Level, message: string, args: unknown[]): void {
    if (!logFilePath) return;
    const timestamp = new Date().toISOString().replace("T", " ").split(".")[0];
    const suffix = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
    fs.appendFileSync(logFilePath, `[${timestamp}] ${level.toUpperCase()}: ${message}${suffix}\n`);
}

function writeToConsole(level: Level, message: string, args: unknown[]): void {
    const { color, emoji } = styles[level];
    const line = color(`${emoji} ${message}`);
    if (level === "error") {
        console.error(line, ...args);
    } else if (level === "warn") {
        console.warn(line, ...args);
    } else if (stderrOnly) {
        console.error(line, ...args);
    } else {
        console.log(line, ...args);
    }
}

function emit(level: Level, message: string, args: unknown[]): void {
    if (currentThreshold() < levelThreshold[level]) return;
    if (logFilePath) {
        writeToFile(level, message, args);
    } else {
        writeToConsole(level, message, args);
    }
}

/**
 * Send all log output to a file instead of the console
 */
function initFileLogging(filePath: string): void {
    logFilePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

function useStderr(): void {
    stderrOnly = true;
}

/**
 * Back to console output on stdout. Used between tests.
 */
function reset(): void {
    logFilePath = null;
    stderrOnly = false;
}

export const logger = {
    initFileLogging,
    useStderr,
    reset,

    error: (message: string, error?: unknown) => emit("error", message, error === undefined ? [] : [error]),
    warn: (message: string, ...args: unknown[]) => emit("warn", message, args),
    info: (message: string, ...args: unknown[]) => emit("info", message, args),
    success: (message: string, ...args: unknown[]) => emit("success", message, args),
    debug: (message: string, ...args: unknown[]) => emit("debug", message, args),
};
