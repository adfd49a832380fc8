import * as fsPromises from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { formatAnyError } from "@/lib/error-formatter";
import { logger } from "@/utils/logger";

/**
 * File system helpers used by configuration loading and store snapshots.
 *
 * - Path resolution and expansion (home directory ~)
 * - JSON file read/write with atomic replace
 * - Text file reads
 */

export function expandHome(filePath: string): string {
    if (filePath.startsWith("~")) {
        return path.join(os.homedir(), filePath.slice(1));
    }
    return filePath;
}

export function resolvePath(filePath: string): string {
    return path.resolve(expandHome(filePath));
}

export async function ensureDirectory(dirPath: string): Promise<void> {
    await fsPromises.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fsPromises.stat(resolvePath(filePath));
        return stat.isFile();
    } catch (err: unknown) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            return false;
        }
        throw err;
    }
}

export async function readTextFile(filePath: string): Promise<string> {
    return await fsPromises.readFile(resolvePath(filePath), "utf-8");
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * callers validate the parsed value themselves.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
    try {
        const content = await fsPromises.readFile(resolvePath(filePath), "utf-8");
        return JSON.parse(content);
    } catch (err: unknown) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            return null;
        }
        logger.error(`Failed to read JSON file ${filePath}: ${formatAnyError(err)}`);
        throw err;
    }
}

export async function writeJsonFile<T>(
    filePath: string,
    data: T,
    options?: { spaces?: number }
): Promise<void> {
    const resolvedPath = resolvePath(filePath);
    await ensureDirectory(path.dirname(resolvedPath));
    const spaces = options?.spaces ?? 2;
    const tempPath = `${resolvedPath}.${process.pid}.tmp`;
    await fsPromises.writeFile(tempPath, JSON.stringify(data, null, spaces));
    await fsPromises.rename(tempPath, resolvedPath);
}
