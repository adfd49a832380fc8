/**
 * HybridSearchEngine - ranks stored messages against a parsed query.
 *
 * Handles:
 * - Candidate retrieval from the vector, keyword and time-range indexes
 * - Hard filters (channels, users, explicit date range)
 * - Weighted fusion of semantic, keyword and temporal scores
 * - Ordering by combined score, newest first on ties
 * - Guidance instead of a bare empty list when nothing matches
 */

import { withTimeout } from "@/lib/async";
import type { Message } from "@/messages/types";
import type { EmbeddingProvider } from "@/services/embedding/EmbeddingProvider";
import type { MessageFilter, MessageStore } from "@/services/store/types";
import { logger } from "@/utils/logger";
import {
    DEFAULT_RANKING_WEIGHTS,
    DEFAULT_TEMPORAL_SCORING,
    type TemporalScoringOptions,
    combineScores,
    keywordScore,
    semanticScore,
    temporalScore,
} from "./scoring";
import { toRange } from "./TemporalResolver";
import type { ParsedQuery, RankingWeights, SearchFilters, SearchOptions, SearchResponse, SearchResult } from "./types";

export interface HybridSearchEngineOptions {
    weights?: RankingWeights;
    candidatePoolSize?: number;
    temporal?: TemporalScoringOptions;
    defaultMinScore?: number;
    /** Deadline for embedding the query text */
    queryTimeoutMs?: number;
}

interface ActiveFilters {
    channels: Set<string>;
    users: Set<string>;
    start?: number;
    end?: number;
}

function buildFilters(query: ParsedQuery, filters: SearchFilters | undefined): ActiveFilters {
    const lower = (values: readonly string[] | undefined) => (values ?? []).map((v) => v.toLowerCase());
    return {
        channels: new Set([...query.channels, ...lower(filters?.channels)]),
        users: new Set([...query.users, ...lower(filters?.users)]),
        start: filters?.dateRange?.start?.getTime(),
        end: filters?.dateRange?.end?.getTime(),
    };
}

function hasActiveFilters(filters: ActiveFilters): boolean {
    return filters.channels.size > 0 || filters.users.size > 0 || filters.start !== undefined || filters.end !== undefined;
}

function toMessageFilter(filters: ActiveFilters): MessageFilter {
    return {
        channels: [...filters.channels],
        users: [...filters.users],
        start: filters.start === undefined ? undefined : new Date(filters.start),
        end: filters.end === undefined ? undefined : new Date(filters.end),
    };
}

function passesFilters(message: Message, filters: ActiveFilters): boolean {
    if (filters.channels.size > 0 && !filters.channels.has(message.channel.toLowerCase())) return false;
    if (filters.users.size > 0 && !filters.users.has(message.sender.toLowerCase())) return false;
    const ts = message.timestamp.getTime();
    if (filters.start !== undefined && ts < filters.start) return false;
    if (filters.end !== undefined && ts > filters.end) return false;
    return true;
}

export function compareResults(a: SearchResult, b: SearchResult): number {
    if (b.combinedScore !== a.combinedScore) {
        return b.combinedScore - a.combinedScore;
    }
    return b.message.timestamp.getTime() - a.message.timestamp.getTime();
}

export class HybridSearchEngine {
    private readonly weights: RankingWeights;
    private readonly candidatePoolSize: number;
    private readonly temporal: TemporalScoringOptions;
    private readonly defaultMinScore: number;
    private readonly queryTimeoutMs: number;

    constructor(
        private readonly store: MessageStore,
        private readonly embeddingProvider: EmbeddingProvider,
        options: HybridSearchEngineOptions = {}
    ) {
        this.weights = options.weights ?? DEFAULT_RANKING_WEIGHTS;
        this.candidatePoolSize = options.candidatePoolSize ?? 50;
        this.temporal = options.temporal ?? DEFAULT_TEMPORAL_SCORING;
        this.defaultMinScore = options.defaultMinScore ?? 0;
        this.queryTimeoutMs = options.queryTimeoutMs ?? 10_000;
    }

    async search(query: ParsedQuery, options: SearchOptions): Promise<SearchResponse> {
        const limit = Math.max(1, Math.floor(options.limit));
        const minScore = options.minScore ?? this.defaultMinScore;
        const filters = buildFilters(query, options.filters);

        const queryVector = query.originalText.trim()
            ? await withTimeout(this.embeddingProvider.embed(query.originalText), this.queryTimeoutMs, "query embedding")
            : null;

        const candidateIds = await this.collectCandidates(query, queryVector, limit, filters);

        const results: SearchResult[] = [];
        for (const id of candidateIds) {
            const record = await this.store.getRecord(id);
            if (!record || !passesFilters(record.message, filters)) continue;

            const semantic = queryVector ? semanticScore(queryVector, record.embedding) : 0;
            const keyword = keywordScore(query.keywords, record.message, record.keywords);
            const temporal = temporalScore(record.message.timestamp, query.temporalHint, this.temporal);
            const combinedScore = combineScores({ semantic, keyword: keyword.score, temporal }, this.weights);
            if (combinedScore < minScore) continue;

            results.push({
                message: record.message,
                semanticScore: semantic,
                keywordScore: keyword.score,
                temporalScore: temporal,
                combinedScore,
                matchedKeywords: keyword.matched,
            });
        }

        results.sort(compareResults);
        logger.debug(`Search "${query.originalText}" scored ${results.length} of ${candidateIds.size} candidates`);

        if (results.length === 0) {
            return { kind: "empty", guidance: await this.buildGuidance(query, options.filters) };
        }
        return { kind: "results", results: results.slice(0, limit) };
    }

    /**
     * Hard filters narrow the vector pool at the store, so an eligible message
     * is never crowded out by nearer ones that the filters would drop.
     */
    private async collectCandidates(
        query: ParsedQuery,
        queryVector: Float32Array | null,
        limit: number,
        filters: ActiveFilters
    ): Promise<Set<string>> {
        const ids = new Set<string>();
        const hint = query.temporalHint;
        const timeRange = hint ? toRange(hint.resolved, this.temporal.pointToleranceMs) : null;
        const poolSize = Math.max(this.candidatePoolSize, limit);
        const vectorFilter = hasActiveFilters(filters) ? toMessageFilter(filters) : undefined;
        const [vectorMatches, keywordIds, timeIds] = await Promise.all([
            queryVector ? this.store.queryByVector(queryVector, poolSize, vectorFilter) : [],
            query.keywords.length > 0 ? this.store.queryByKeywords(query.keywords) : [],
            timeRange ? this.store.queryByTimeRange(timeRange.start, timeRange.end) : [],
        ]);
        for (const match of vectorMatches) ids.add(match.id);
        for (const id of keywordIds) ids.add(id);
        for (const id of timeIds) ids.add(id);
        return ids;
    }

    private async buildGuidance(query: ParsedQuery, filters: SearchFilters | undefined): Promise<string[]> {
        if ((await this.store.count()) === 0) {
            return ["No messages have been ingested yet. Ingest messages before searching."];
        }

        const guidance: string[] = [];
        if (query.keywords.length > 0) {
            guidance.push(`Try broader or alternative keywords than: ${query.keywords.join(", ")}.`);
        } else {
            guidance.push("Add a topic keyword, for example what the conversation was about.");
        }

        const channels = [...query.channels, ...(filters?.channels ?? [])];
        if (channels.length > 0) {
            guidance.push(`Remove the channel filter (${channels.map((c) => `#${c}`).join(", ")}) to search every channel.`);
        }
        const users = [...query.users, ...(filters?.users ?? [])];
        if (users.length > 0) {
            guidance.push(`Remove the sender filter (${users.map((u) => `@${u}`).join(", ")}) to include everyone.`);
        }
        if (query.temporalHint) {
            guidance.push(`Widen the time range beyond "${query.temporalHint.rawValue}".`);
        } else if (filters?.dateRange) {
            guidance.push("Widen or remove the date range filter.");
        }
        return guidance;
    }
}
