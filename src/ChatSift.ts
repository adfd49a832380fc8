/**
 * ChatSift - wires the engine together and exposes its operations:
 * ingest, search, getThreadContext, getContextualMeaning and createChunks,
 * plus batch ingestion, conversational search sessions and corpus statistics.
 */

import * as path from "node:path";
import { MessageContextualizer } from "@/contextualizer/MessageContextualizer";
import { DEDUP_INDEX_FILE, MESSAGES_FILE } from "@/constants";
import { DeduplicationGate } from "@/dedup/DeduplicationGate";
import { type Clock, systemClock } from "@/lib/clock";
import { formatAnyError } from "@/lib/error-formatter";
import { resolvePath } from "@/lib/fs";
import { parseMessage } from "@/messages/schema";
import type { ConversationChunk, Message, ThreadContext } from "@/messages/types";
import type { EntityRecognizer } from "@/search/EntityRecognizer";
import { HybridSearchEngine } from "@/search/HybridSearchEngine";
import { QueryParser } from "@/search/QueryParser";
import { SearchSessionService } from "@/search/SearchSessionService";
import type { ParsedQuery, SearchFilters, SearchResponse } from "@/search/types";
import type { ChatSiftConfig } from "@/services/config/types";
import { type EmbeddingProvider, createEmbeddingProvider } from "@/services/embedding";
import {
    type IngestOutcome,
    type IngestionStats,
    IngestionService,
    emptyStats,
} from "@/services/ingestion/IngestionService";
import { type ConversationStats, type StatsTimeRange, computeConversationStats } from "@/services/stats";
import { InMemoryDedupIndex } from "@/services/store/InMemoryDedupIndex";
import { InMemoryMessageStore } from "@/services/store/InMemoryMessageStore";
import type { DedupIndex, MessageStore } from "@/services/store/types";
import { StoreThreadContextRepository } from "@/services/thread/ThreadContextRepository";
import { ThreadContextCache } from "@/services/thread/ThreadContextCache";
import { logger } from "@/utils/logger";

export interface ChatSiftDependencies {
    embeddingProvider?: EmbeddingProvider;
    store?: MessageStore;
    dedupIndex?: DedupIndex;
    clock?: Clock;
    entityRecognizer?: EntityRecognizer;
}

export interface SearchRequestOptions {
    limit?: number;
    filters?: SearchFilters;
    minScore?: number;
}

interface Flushable {
    flush(): Promise<void>;
}

export class ChatSift {
    readonly parser: QueryParser;
    readonly contextualizer: MessageContextualizer;
    readonly engine: HybridSearchEngine;
    readonly sessions: SearchSessionService;

    private readonly store: MessageStore;
    private readonly threads: ThreadContextCache;
    private readonly ingestion: IngestionService;
    private readonly persistent: Flushable[] = [];

    constructor(
        private readonly config: ChatSiftConfig,
        deps: ChatSiftDependencies = {}
    ) {
        const clock = deps.clock ?? systemClock;
        const embeddingProvider = deps.embeddingProvider ?? createEmbeddingProvider(config.embedding);
        this.store = deps.store ?? new InMemoryMessageStore();
        const dedupIndex = deps.dedupIndex ?? new InMemoryDedupIndex();

        this.threads = new ThreadContextCache(
            new StoreThreadContextRepository(this.store, config.contextualizer.recentWindowSize)
        );
        this.contextualizer = new MessageContextualizer(embeddingProvider, this.threads, {
            shortMessageThreshold: config.contextualizer.shortMessageThreshold,
            channelTopics: config.contextualizer.channelTopics,
        });
        this.parser = new QueryParser({ clock, entityRecognizer: deps.entityRecognizer });
        this.engine = new HybridSearchEngine(this.store, embeddingProvider, {
            weights: config.search.weights,
            candidatePoolSize: config.search.candidatePoolSize,
            defaultMinScore: config.search.minScore,
            queryTimeoutMs: config.embedding.timeoutMs,
            temporal: {
                halfLifeMs: config.search.temporalHalfLifeHours * 3_600_000,
                pointToleranceMs: config.search.pointToleranceHours * 3_600_000,
            },
        });
        this.sessions = new SearchSessionService(this.parser, this.engine, {
            clock,
            defaultLimit: config.search.defaultLimit,
        });

        const gate = new DeduplicationGate(dedupIndex, { keyPolicy: config.dedup.keyPolicy, clock });
        this.ingestion = new IngestionService(gate, this.store, this.contextualizer, this.threads, {
            maxAttempts: config.ingestion.maxRetries,
            retryBaseMs: config.ingestion.retryBaseMs,
        });
    }

    /**
     * Open an engine whose store and dedup index live as JSON snapshots in
     * the configured data directory.
     */
    static async open(config: ChatSiftConfig, deps: Omit<ChatSiftDependencies, "store" | "dedupIndex"> = {}): Promise<ChatSift> {
        const dataDir = resolvePath(config.dataDir);
        const store = new InMemoryMessageStore({ snapshotPath: path.join(dataDir, MESSAGES_FILE) });
        const dedupIndex = new InMemoryDedupIndex({ snapshotPath: path.join(dataDir, DEDUP_INDEX_FILE) });
        await Promise.all([store.load(), dedupIndex.load()]);

        const engine = new ChatSift(config, { ...deps, store, dedupIndex });
        engine.persistent.push(store, dedupIndex);
        logger.debug(`Opened data directory ${dataDir} (${await store.count()} messages)`);
        return engine;
    }

    /**
     * Validate raw input into a Message, deriving its id under the configured
     * dedup key policy when absent
     *
     * @throws InvalidMessageError
     */
    toMessage(input: unknown): Message {
        return parseMessage(input, this.config.dedup.keyPolicy);
    }

    /**
     * Validate and ingest one captured message
     *
     * @throws InvalidMessageError (including OutOfOrderMessageError)
     */
    async ingest(input: unknown): Promise<IngestOutcome> {
        return this.ingestion.ingest(this.toMessage(input));
    }

    /**
     * Ingest many messages in the given order. Invalid entries are counted as
     * failures instead of aborting the batch.
     */
    async ingestBatch(inputs: readonly unknown[]): Promise<IngestionStats> {
        const messages: Message[] = [];
        const rejected = emptyStats();
        inputs.forEach((input, index) => {
            try {
                messages.push(this.toMessage(input));
            } catch (error) {
                rejected.totalProcessed++;
                rejected.failed++;
                rejected.errors.push({ messageId: `#${index}`, error: formatAnyError(error) });
            }
        });

        const stats = await this.ingestion.ingestBatch(messages);
        return {
            ...stats,
            totalProcessed: stats.totalProcessed + rejected.totalProcessed,
            failed: stats.failed + rejected.failed,
            errors: [...rejected.errors, ...stats.errors],
        };
    }

    parseQuery(queryText: string): ParsedQuery {
        return this.parser.parse(queryText);
    }

    async search(queryText: string, options: SearchRequestOptions = {}): Promise<SearchResponse> {
        const parsed = this.parser.parse(queryText);
        return this.engine.search(parsed, {
            limit: options.limit ?? this.config.search.defaultLimit,
            filters: options.filters,
            minScore: options.minScore,
        });
    }

    getThreadContext(threadId: string): Promise<ThreadContext | null> {
        return this.threads.getThread(threadId);
    }

    /**
     * Interpretation of a stored message, or null when the message is unknown
     * or carries no short-message meaning
     */
    async getContextualMeaning(messageId: string): Promise<string | null> {
        const message = await this.store.get(messageId);
        if (!message) return null;
        return this.contextualizer.extractContextualMeaning(message);
    }

    createChunks(
        messages: readonly Message[],
        timeWindowMs = this.config.chunking.timeWindowSeconds * 1000,
        maxSize = this.config.chunking.maxChunkSize
    ): ConversationChunk[] {
        return this.contextualizer.createConversationChunks(messages, { timeWindowMs, maxChunkSize: maxSize });
    }

    messageCount(): Promise<number> {
        return this.store.count();
    }

    /**
     * Totals, date span and most frequent keywords, senders and channels of
     * the stored messages, optionally limited to a time range
     */
    async getConversationStats(range: StatsTimeRange = {}, top = 10): Promise<ConversationStats> {
        return computeConversationStats(await this.store.listRecords(), range, top);
    }

    /**
     * Write file-backed state. A no-op for purely in-memory engines.
     */
    async flush(): Promise<void> {
        await Promise.all(this.persistent.map((target) => target.flush()));
    }
}
