import type { Message } from "@/messages/types";

export type QueryIntent = "search" | "show" | "list" | "analyze" | "summarize" | "compare" | "filter";

export type EntityKind = "person" | "organization" | "place";

export interface Entity {
    text: string;
    kind: EntityKind;
}

export type ResolvedTime =
    | { kind: "point"; date: Date }
    | { kind: "range"; start: Date; end: Date };

export interface TemporalHint {
    kind: "relative" | "absolute";
    /** Phrase as it appeared in the query, lower-cased */
    rawValue: string;
    resolved: ResolvedTime;
}

export interface ParsedQuery {
    readonly originalText: string;
    readonly intent: QueryIntent;
    readonly keywords: readonly string[];
    readonly entities: readonly Entity[];
    readonly channels: readonly string[];
    readonly users: readonly string[];
    readonly temporalHint?: TemporalHint;
}

export interface DateRangeFilter {
    start?: Date;
    end?: Date;
}

export interface SearchFilters {
    channels?: string[];
    users?: string[];
    dateRange?: DateRangeFilter;
}

export interface SearchOptions {
    limit: number;
    filters?: SearchFilters;
    minScore?: number;
}

export interface SearchResult {
    message: Message;
    semanticScore: number;
    keywordScore: number;
    temporalScore: number;
    combinedScore: number;
    matchedKeywords: string[];
}

export type SearchResponse =
    | { kind: "results"; results: SearchResult[] }
    | { kind: "empty"; guidance: string[] };

export interface RankingWeights {
    semantic: number;
    keyword: number;
    temporal: number;
}
