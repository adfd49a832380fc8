import type { EmbeddingConfig } from "@/services/config/types";
import { logger } from "@/utils/logger";
import { type EmbeddingProvider, OpenAIEmbeddingProvider } from "./EmbeddingProvider";
import { GuardedEmbeddingProvider } from "./GuardedEmbeddingProvider";
import { HashingEmbeddingProvider } from "./HashingEmbeddingProvider";

export type { EmbeddingProvider } from "./EmbeddingProvider";
export { OpenAIEmbeddingProvider, assertEmbeddableTexts } from "./EmbeddingProvider";
export { GuardedEmbeddingProvider } from "./GuardedEmbeddingProvider";
export { HashingEmbeddingProvider } from "./HashingEmbeddingProvider";

/**
 * Build the configured provider, wrapped in the concurrency/timeout guard.
 * Falls back to hashing embeddings when OpenAI is selected without an API key.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): GuardedEmbeddingProvider {
    let inner: EmbeddingProvider;
    switch (config.provider) {
        case "openai":
            if (config.apiKey) {
                inner = new OpenAIEmbeddingProvider(config.apiKey, config.model, config.baseUrl);
            } else {
                logger.warn("OpenAI embeddings selected but no API key configured; using hashing embeddings");
                inner = new HashingEmbeddingProvider(config.dimensions);
            }
            break;
        case "hashing":
            inner = new HashingEmbeddingProvider(config.dimensions);
            break;
    }

    return new GuardedEmbeddingProvider(inner, {
        concurrency: config.concurrency,
        timeoutMs: config.timeoutMs,
    });
}
