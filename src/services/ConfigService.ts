import * as os from "node:os";
import * as path from "node:path";
import { CHATSIFT_DIR, CONFIG_FILE } from "@/constants";
import { formatAnyError } from "@/lib/error-formatter";
import { readJsonFile, resolvePath } from "@/lib/fs";
import { type ChatSiftConfig, ChatSiftConfigSchema } from "@/services/config/types";
import { logger } from "@/utils/logger";

/**
 * Environment variables that override config.json
 */
type Env = Record<string, string | undefined>;

/**
 * Apply CHATSIFT_* environment overrides to raw (pre-validation) config data
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
    const embedding: Record<string, unknown> =
        typeof raw.embedding === "object" && raw.embedding !== null ? { ...raw.embedding } : {};

    if (env.CHATSIFT_EMBEDDING_PROVIDER) embedding.provider = env.CHATSIFT_EMBEDDING_PROVIDER;
    if (env.CHATSIFT_EMBEDDING_MODEL) embedding.model = env.CHATSIFT_EMBEDDING_MODEL;
    if (env.CHATSIFT_EMBEDDING_BASE_URL) embedding.baseUrl = env.CHATSIFT_EMBEDDING_BASE_URL;
    const apiKey = env.CHATSIFT_EMBEDDING_API_KEY ?? env.OPENAI_API_KEY;
    if (apiKey && embedding.apiKey === undefined) embedding.apiKey = apiKey;

    return {
        ...raw,
        ...(env.CHATSIFT_DATA_DIR ? { dataDir: env.CHATSIFT_DATA_DIR } : {}),
        embedding,
    };
}

/**
 * Configuration loading for chatsift.
 * Pure file operations with validation - no business logic.
 */
export class ConfigService {
    private loadedConfig?: ChatSiftConfig;
    private loadedFrom?: string;

    constructor(private readonly env: Env = process.env) {}

    getGlobalPath(): string {
        return path.join(os.homedir(), CHATSIFT_DIR);
    }

    getDefaultConfigPath(): string {
        return path.join(this.getGlobalPath(), CONFIG_FILE);
    }

    /**
     * Get the currently loaded config
     */
    getConfig(): ChatSiftConfig {
        if (!this.loadedConfig) {
            throw new Error("Config not loaded. Call loadConfig() first.");
        }
        return this.loadedConfig;
    }

    /**
     * Load and validate config.json, then apply environment overrides.
     * A missing file yields the defaults.
     */
    async loadConfig(configPath?: string): Promise<ChatSiftConfig> {
        const filePath = resolvePath(configPath ?? this.getDefaultConfigPath());
        if (this.loadedConfig && this.loadedFrom === filePath) {
            return this.loadedConfig;
        }

        const raw = await readJsonFile(filePath);
        let data: object = {};
        if (raw === null) {
            logger.debug(`No config file at ${filePath}, using defaults`);
        } else {
            if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
                throw new Error(`Config file ${filePath} must contain a JSON object`);
            }
            data = raw;
        }

        this.loadedConfig = this.parse(data, filePath);
        this.loadedFrom = filePath;
        return this.loadedConfig;
    }

    /**
     * Validate already-parsed config data (used by tests and embedders)
     */
    parse(raw: object, source = "inline config"): ChatSiftConfig {
        const merged = applyEnvOverrides({ ...raw }, this.env);
        const result = ChatSiftConfigSchema.safeParse(merged);
        if (!result.success) {
            throw new Error(`Invalid configuration in ${source}: ${formatAnyError(result.error)}`);
        }
        return result.data;
    }

    /**
     * Resolved data directory (~ expanded)
     */
    getDataDir(): string {
        return resolvePath(this.getConfig().dataDir);
    }
}
