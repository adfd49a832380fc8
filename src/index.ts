// ChatSift library entry point

export { ChatSift, type ChatSiftDependencies, type SearchRequestOptions } from "./ChatSift";

export type {
    ConversationChunk,
    Message,
    MessageMetadata,
    MessageType,
    ThreadContext,
    TimeWindow,
} from "./messages/types";
export { MessageInputSchema, parseMessage, type MessageInput } from "./messages/schema";
export { computeContentHash, computeDedupKey, deriveMessageId, type DedupKeyPolicy } from "./messages/dedupKey";

export { QueryParser, type QueryParserOptions } from "./search/QueryParser";
export { CapitalizedSpanRecognizer, type EntityRecognizer } from "./search/EntityRecognizer";
export { HybridSearchEngine, type HybridSearchEngineOptions } from "./search/HybridSearchEngine";
export {
    SearchSessionService,
    type RefinementSuggestion,
    type SearchRefinement,
    type SessionSearchResult,
} from "./search/SearchSessionService";
export { DEFAULT_RANKING_WEIGHTS } from "./search/scoring";
export type {
    Entity,
    ParsedQuery,
    QueryIntent,
    RankingWeights,
    SearchFilters,
    SearchOptions,
    SearchResponse,
    SearchResult,
    TemporalHint,
} from "./search/types";

export { MessageContextualizer, type ContextualizerOptions } from "./contextualizer/MessageContextualizer";
export { createConversationChunks, type ChunkingOptions } from "./contextualizer/ConversationChunker";
export { ShortMessageLexicon, getDefaultLexicon } from "./contextualizer/ShortMessageLexicon";

export { DeduplicationGate, type DeduplicationResult } from "./dedup/DeduplicationGate";

export {
    type EmbeddingProvider,
    GuardedEmbeddingProvider,
    HashingEmbeddingProvider,
    OpenAIEmbeddingProvider,
    createEmbeddingProvider,
} from "./services/embedding";
export { InMemoryDedupIndex, InMemoryMessageStore, type DedupIndex, type MessageStore } from "./services/store";
export { StoreThreadContextRepository, ThreadContextCache, type ThreadContextRepository } from "./services/thread";
export { ConfigService } from "./services/ConfigService";
export { ChatSiftConfigSchema, type ChatSiftConfig } from "./services/config/types";
export { type IngestionStats, type IngestOutcome } from "./services/ingestion/IngestionService";
export { type ConversationStats, type StatsTimeRange, computeConversationStats } from "./services/stats";

export { createToolRegistry, type ChatSiftTool, type ToolName, type ToolResult } from "./tools/registry";

export * from "./lib/errors";
export { type Clock, fixedClock, systemClock } from "./lib/clock";
