/**
 * IngestionService - the write path.
 *
 * Each message goes through the deduplication gate first. New and updated
 * messages are embedded from their contextual enhancement and stored;
 * reaction-only changes refresh stored metadata without re-embedding.
 * Store writes are retried with exponential backoff, and a classification is
 * rolled back when the write that follows it fails. Within a batch, a failed
 * write that a later capture of the same message superseded stays as the
 * origin of any further rollback for that key.
 */

import type { DeduplicationGate, DeduplicationResult, GateDecision } from "@/dedup/DeduplicationGate";
import type { MessageContextualizer } from "@/contextualizer/MessageContextualizer";
import { withRetry } from "@/lib/async";
import { StoreUnavailableError } from "@/lib/errors";
import { formatAnyError } from "@/lib/error-formatter";
import type { Message } from "@/messages/types";
import { extractKeywords } from "@/search/KeywordExtractor";
import type { MessageStore } from "@/services/store/types";
import type { ThreadContextCache } from "@/services/thread/ThreadContextCache";
import { logger } from "@/utils/logger";

export interface IngestOutcome {
    result: DeduplicationResult;
    contextualMeaning: string | null;
}

export interface IngestionStats {
    totalProcessed: number;
    newMessages: number;
    duplicates: number;
    updates: number;
    reactionUpdates: number;
    failed: number;
    errors: Array<{ messageId: string; error: string }>;
}

export interface IngestionServiceOptions {
    /** Total attempts for a store write */
    maxAttempts: number;
    retryBaseMs: number;
}

interface PendingWrite {
    message: Message;
    decision: GateDecision;
}

export function emptyStats(): IngestionStats {
    return {
        totalProcessed: 0,
        newMessages: 0,
        duplicates: 0,
        updates: 0,
        reactionUpdates: 0,
        failed: 0,
        errors: [],
    };
}

function countResult(stats: IngestionStats, result: DeduplicationResult): void {
    switch (result.kind) {
        case "new":
            stats.newMessages++;
            break;
        case "duplicate":
            stats.duplicates++;
            break;
        case "updated":
            stats.updates++;
            break;
        case "reactionsUpdated":
            stats.reactionUpdates++;
            break;
    }
}

export class IngestionService {
    constructor(
        private readonly gate: DeduplicationGate,
        private readonly store: MessageStore,
        private readonly contextualizer: MessageContextualizer,
        private readonly threadCache: ThreadContextCache | null,
        private readonly options: IngestionServiceOptions
    ) {}

    async ingest(message: Message): Promise<IngestOutcome> {
        const decision = await this.withStoreRetry("dedup classification", () => this.gate.process(message));
        const { result } = decision;

        switch (result.kind) {
            case "duplicate":
                logger.debug(`Duplicate message ${result.id} skipped`);
                return { result, contextualMeaning: null };
            case "reactionsUpdated":
                await this.applyReactions(message, result);
                return { result, contextualMeaning: null };
            case "new":
            case "updated": {
                const stored = this.toStoredMessage(message, decision);
                await this.writeOrRestore(message, decision, decision, async () => {
                    const embedding = await this.contextualizer.generateContextualEmbedding(stored);
                    await this.persist(stored, embedding);
                });
                const contextualMeaning = await this.contextualizer.extractContextualMeaning(stored);
                return { result, contextualMeaning };
            }
        }
    }

    /**
     * Ingest in input order. Classification is sequential; embeddings are
     * generated concurrently (bounded by the provider), top-level messages
     * before thread replies so replies can see their parents.
     */
    async ingestBatch(messages: readonly Message[]): Promise<IngestionStats> {
        const stats = emptyStats();
        const pending: PendingWrite[] = [];

        for (const message of messages) {
            stats.totalProcessed++;
            try {
                const decision = await this.withStoreRetry("dedup classification", () => this.gate.process(message));
                const { result } = decision;
                if (result.kind === "new" || result.kind === "updated") {
                    pending.push({ message, decision });
                    continue;
                }
                if (result.kind === "reactionsUpdated") {
                    await this.applyReactions(message, result);
                }
                countResult(stats, result);
            } catch (error) {
                this.recordFailure(stats, message, error);
            }
        }

        const topLevel = pending.filter((write) => !write.message.threadId);
        const replies = pending.filter((write) => write.message.threadId);
        const unwritten = new Map<string, GateDecision>();
        for (const wave of [topLevel, replies]) {
            await this.writeWave(wave, stats, unwritten);
        }

        logger.info(
            `Ingested ${stats.totalProcessed} messages: ${stats.newMessages} new, ${stats.updates} updated, ` +
                `${stats.reactionUpdates} reaction updates, ${stats.duplicates} duplicates, ${stats.failed} failed`
        );
        return stats;
    }

    /**
     * @param unwritten - Per dedup key, the earliest decision of this batch whose write failed
     */
    private async writeWave(
        wave: PendingWrite[],
        stats: IngestionStats,
        unwritten: Map<string, GateDecision>
    ): Promise<void> {
        const stored = wave.map((write) => this.toStoredMessage(write.message, write.decision));
        const embeddings = await Promise.allSettled(
            stored.map((message) => this.contextualizer.generateContextualEmbedding(message))
        );

        for (let i = 0; i < wave.length; i++) {
            const write = wave[i];
            const embedding = embeddings[i];
            const { dedupKey } = write.decision.result.record;
            const origin = unwritten.get(dedupKey) ?? write.decision;
            try {
                await this.writeOrRestore(write.message, write.decision, origin, async () => {
                    if (embedding.status === "rejected") {
                        throw embedding.reason;
                    }
                    await this.persist(stored[i], embedding.value);
                });
                unwritten.delete(dedupKey);
                countResult(stats, write.decision.result);
            } catch (error) {
                unwritten.set(dedupKey, origin);
                this.recordFailure(stats, write.message, error);
            }
        }
    }

    private toStoredMessage(message: Message, decision: GateDecision): Message {
        const { record } = decision.result;
        return {
            ...message,
            id: decision.result.id,
            metadata: {
                ...message.metadata,
                reactions: { ...record.lastReactions },
                contentHash: record.contentHash,
                version: record.version,
                ...(record.editedAt ? { editedAt: record.editedAt } : {}),
            },
        };
    }

    private async persist(message: Message, embedding: Float32Array): Promise<void> {
        const keywords = extractKeywords(message.content);
        await this.withStoreRetry("message upsert", () => this.store.upsert({ message, embedding, keywords }));
        if (this.threadCache) {
            await this.threadCache.invalidate(message.threadId ?? message.id);
        }
    }

    private async writeOrRestore(
        message: Message,
        decision: GateDecision,
        origin: GateDecision,
        write: () => Promise<void>
    ): Promise<void> {
        try {
            await write();
        } catch (error) {
            const restored = await this.gate.restore(decision, origin);
            if (restored) {
                logger.warn(`Rolled back classification of ${message.id}: ${formatAnyError(error)}`);
            } else {
                logger.warn(`Write of ${message.id} failed after a newer capture replaced it: ${formatAnyError(error)}`);
            }
            throw error;
        }
    }

    private async applyReactions(message: Message, result: DeduplicationResult): Promise<void> {
        const { id } = result;
        const reactions = result.record.lastReactions;
        const updated = await this.withStoreRetry("reaction update", () => this.store.updateReactions(id, reactions));
        if (!updated) {
            logger.warn(`Reaction update for ${id} found no stored message`);
            return;
        }
        if (this.threadCache) {
            await this.threadCache.invalidate(message.threadId ?? id);
        }
    }

    private recordFailure(stats: IngestionStats, message: Message, error: unknown): void {
        stats.failed++;
        stats.errors.push({ messageId: message.id, error: formatAnyError(error) });
        logger.error(`Failed to ingest message ${message.id}`, formatAnyError(error));
    }

    private withStoreRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return withRetry(fn, {
            maxAttempts: this.options.maxAttempts,
            baseDelayMs: this.options.retryBaseMs,
            shouldRetry: (error) => error instanceof StoreUnavailableError,
            onRetry: (error, attempt, delayMs) =>
                logger.warn(`${operation} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${formatAnyError(error)}`),
        });
    }
}
