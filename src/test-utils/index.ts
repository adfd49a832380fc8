/**
 * Test utilities: object factories, stub providers and temp directories
 */

export * from "./mock-factories";

import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";

/**
 * Create a temporary directory for testing
 */
export async function createTempDir(prefix = "chatsift-test-"): Promise<string> {
    return fs.mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export async function cleanupTempDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true });
}
