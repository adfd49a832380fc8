import { z } from "zod";

/**
 * Configuration schema for chatsift (config.json).
 * Every field has a default so an empty file is a valid configuration.
 */

// =====================================================================================
// EMBEDDING
// =====================================================================================

export const EmbeddingConfigSchema = z.object({
    provider: z.enum(["hashing", "openai"]).default("hashing"),
    model: z.string().default("text-embedding-3-small"),
    baseUrl: z.string().url().default("https://api.openai.com/v1"),
    apiKey: z.string().optional(),
    /** Only used by the hashing provider */
    dimensions: z.number().int().min(8).default(256),
    timeoutMs: z.number().int().positive().default(10_000),
    concurrency: z.number().int().positive().default(4),
});

// =====================================================================================
// CONTEXTUALIZER & CHUNKING
// =====================================================================================

export const DEFAULT_CHANNEL_TOPICS: Record<string, string> = {
    general: "General team discussions and announcements",
    engineering: "Technical discussions about code and architecture",
    bugs: "Bug reports and issue tracking",
    api: "API design and implementation discussions",
    deployment: "Deployment processes and release management",
    standup: "Daily standup updates and progress reports",
    random: "Casual conversations and off-topic discussions",
};

export const ContextualizerConfigSchema = z.object({
    shortMessageThreshold: z.number().int().nonnegative().default(10),
    recentWindowSize: z.number().int().positive().default(5),
    channelTopics: z.record(z.string()).default(DEFAULT_CHANNEL_TOPICS),
});

export const ChunkingConfigSchema = z.object({
    timeWindowSeconds: z.number().positive().default(600),
    maxChunkSize: z.number().int().positive().default(20),
});

// =====================================================================================
// SEARCH
// =====================================================================================

export const RankingWeightsSchema = z
    .object({
        semantic: z.number().nonnegative(),
        keyword: z.number().nonnegative(),
        temporal: z.number().nonnegative(),
    })
    .refine((w) => w.semantic + w.keyword + w.temporal > 0, {
        message: "At least one ranking weight must be positive",
    });

export const SearchConfigSchema = z.object({
    weights: RankingWeightsSchema.default({ semantic: 0.5, keyword: 0.3, temporal: 0.2 }),
    minScore: z.number().min(0).max(1).default(0),
    defaultLimit: z.number().int().positive().default(10),
    candidatePoolSize: z.number().int().positive().default(50),
    temporalHalfLifeHours: z.number().positive().default(24),
    pointToleranceHours: z.number().nonnegative().default(12),
});

// =====================================================================================
// INGESTION & DEDUP
// =====================================================================================

export const IngestionConfigSchema = z.object({
    /** Total attempts for store writes, including the first */
    maxRetries: z.number().int().positive().default(3),
    retryBaseMs: z.number().int().nonnegative().default(200),
});

export const DedupConfigSchema = z.object({
    keyPolicy: z.enum(["message-id", "sender-timestamp"]).default("message-id"),
});

// =====================================================================================
// MAIN CONFIG SCHEMA (config.json)
// =====================================================================================

export const ChatSiftConfigSchema = z.object({
    dataDir: z.string().default("~/.chatsift/data"),
    logging: z
        .object({
            logFile: z.string().optional(),
        })
        .default({}),
    embedding: EmbeddingConfigSchema.default({}),
    contextualizer: ContextualizerConfigSchema.default({}),
    chunking: ChunkingConfigSchema.default({}),
    search: SearchConfigSchema.default({}),
    ingestion: IngestionConfigSchema.default({}),
    dedup: DedupConfigSchema.default({}),
});

export type ChatSiftConfig = z.infer<typeof ChatSiftConfigSchema>;
export type ChatSiftConfigInput = z.input<typeof ChatSiftConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type ContextualizerConfig = z.infer<typeof ContextualizerConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;
