/**
 * Tool registry - the operations of a ChatSift instance as named, schema-checked
 * tools. Used by the MCP server and by anything else that drives the engine
 * with untyped JSON arguments.
 *
 * Every execute() resolves; failures come back as { ok: false, error } with
 * the error classified as validation, execution or system.
 */

import type { z } from "zod";
import type { ChatSift } from "@/ChatSift";
import { type ToolError, toToolError } from "@/lib/error-formatter";
import { parseDateArgument } from "@/lib/time";
import type { ConversationChunk, Message } from "@/messages/types";
import type { SearchFilters, SearchResponse } from "@/search/types";
import type { ConversationStats } from "@/services/stats";
import { logger } from "@/utils/logger";
import {
    CreateChunksSchema,
    GetContextualMeaningSchema,
    GetConversationStatsSchema,
    GetThreadContextSchema,
    IngestMessageSchema,
    SearchMessagesSchema,
    type SearchMessagesInput,
} from "./schemas";

export type ToolName =
    | "ingest_message"
    | "search_messages"
    | "get_thread_context"
    | "get_contextual_meaning"
    | "create_conversation_chunks"
    | "get_conversation_stats";

export type ToolResult = { ok: true; data: unknown } | { ok: false; error: ToolError };

export interface ChatSiftTool {
    name: ToolName;
    description: string;
    inputSchema: z.AnyZodObject;
    execute(args: unknown): Promise<ToolResult>;
}

export type ToolRegistry = Record<ToolName, ChatSiftTool>;

function defineTool<T extends z.ZodRawShape>(
    name: ToolName,
    description: string,
    inputSchema: z.ZodObject<T>,
    run: (input: z.output<z.ZodObject<T>>, raw: unknown) => Promise<unknown>
): ChatSiftTool {
    return {
        name,
        description,
        inputSchema,
        async execute(args: unknown): Promise<ToolResult> {
            try {
                const input = inputSchema.parse(args ?? {});
                return { ok: true, data: await run(input, args) };
            } catch (error) {
                const toolError = toToolError(error, name);
                logger.debug(`Tool ${name} failed (${toolError.kind}): ${toolError.message}`);
                return { ok: false, error: toolError };
            }
        },
    };
}

function toFilters(input: SearchMessagesInput): SearchFilters | undefined {
    const filters: SearchFilters = {};
    if (input.channels?.length) filters.channels = input.channels;
    if (input.users?.length) filters.users = input.users;
    if (input.since !== undefined || input.until !== undefined) {
        filters.dateRange = {
            start: input.since === undefined ? undefined : parseDateArgument(input.since),
            end: input.until === undefined ? undefined : parseDateArgument(input.until),
        };
    }
    return Object.keys(filters).length > 0 ? filters : undefined;
}

/**
 * JSON-friendly view of a message; Dates become ISO strings
 */
export function serializeMessage(message: Message): Record<string, unknown> {
    return {
        id: message.id,
        timestamp: message.timestamp.toISOString(),
        sender: message.sender,
        content: message.content,
        channel: message.channel,
        ...(message.threadId ? { threadId: message.threadId } : {}),
        messageType: message.messageType,
        ...(message.metadata?.reactions ? { reactions: message.metadata.reactions } : {}),
        ...(message.metadata?.version ? { version: message.metadata.version } : {}),
    };
}

function serializeResponse(response: SearchResponse): Record<string, unknown> {
    if (response.kind === "empty") {
        return { results: [], guidance: response.guidance };
    }
    return {
        results: response.results.map((result) => ({
            message: serializeMessage(result.message),
            combinedScore: result.combinedScore,
            semanticScore: result.semanticScore,
            keywordScore: result.keywordScore,
            temporalScore: result.temporalScore,
            matchedKeywords: result.matchedKeywords,
        })),
    };
}

function serializeChunk(chunk: ConversationChunk): Record<string, unknown> {
    return {
        id: chunk.id,
        topic: chunk.topic,
        summary: chunk.summary,
        participants: chunk.participants,
        messageIds: chunk.messages.map((message) => message.id),
        start: chunk.timeWindow.start.toISOString(),
        end: chunk.timeWindow.end.toISOString(),
    };
}

export function serializeStats(stats: ConversationStats): Record<string, unknown> {
    return {
        ...stats,
        dateRange: stats.dateRange
            ? { earliest: stats.dateRange.earliest.toISOString(), latest: stats.dateRange.latest.toISOString() }
            : null,
    };
}

export function createToolRegistry(chatsift: ChatSift): ToolRegistry {
    return {
        ingest_message: defineTool(
            "ingest_message",
            "Ingest one captured chat message. Duplicates are skipped; edits and reaction changes update the stored copy.",
            IngestMessageSchema,
            async (_input, raw) => {
                const outcome = await chatsift.ingest(raw);
                return {
                    result: outcome.result.kind,
                    id: outcome.result.id,
                    version: outcome.result.record.version,
                    contextualMeaning: outcome.contextualMeaning,
                };
            }
        ),

        search_messages: defineTool(
            "search_messages",
            "Search ingested messages with a natural-language query. Returns ranked results, or guidance when nothing matches.",
            SearchMessagesSchema,
            async (input) => {
                const filters = toFilters(input);
                if (input.sessionId) {
                    await chatsift.sessions.ensureSession(input.sessionId);
                    const turn = await chatsift.sessions.search(input.sessionId, input.query, {
                        limit: input.limit,
                        filters,
                    });
                    return {
                        ...serializeResponse(turn.response),
                        sessionId: turn.sessionId,
                        turnNumber: turn.turnNumber,
                        suggestions: turn.suggestions.map((suggestion) => suggestion.description),
                    };
                }
                const response = await chatsift.search(input.query, {
                    limit: input.limit,
                    filters,
                    minScore: input.minScore,
                });
                return serializeResponse(response);
            }
        ),

        get_thread_context: defineTool(
            "get_thread_context",
            "Get the parent message and most recent replies of a thread.",
            GetThreadContextSchema,
            async (input) => {
                const context = await chatsift.getThreadContext(input.threadId);
                if (!context) return null;
                return {
                    threadId: context.threadId,
                    parentMessage: context.parentMessage ? serializeMessage(context.parentMessage) : null,
                    recentMessages: context.recentMessages.map(serializeMessage),
                    totalMessageCount: context.totalMessageCount,
                };
            }
        ),

        get_contextual_meaning: defineTool(
            "get_contextual_meaning",
            "Explain what a short message (emoji, 'lgtm', 'ok') means in its thread.",
            GetContextualMeaningSchema,
            async (input) => ({
                messageId: input.messageId,
                meaning: await chatsift.getContextualMeaning(input.messageId),
            })
        ),

        create_conversation_chunks: defineTool(
            "create_conversation_chunks",
            "Group messages into time-bounded conversation chunks with a topic and summary.",
            CreateChunksSchema,
            async (input) => {
                const messages = input.messages.map((message) => chatsift.toMessage(message));
                const chunks = chatsift.createChunks(
                    messages,
                    input.timeWindowSeconds === undefined ? undefined : input.timeWindowSeconds * 1000,
                    input.maxChunkSize
                );
                return { chunks: chunks.map(serializeChunk) };
            }
        ),

        get_conversation_stats: defineTool(
            "get_conversation_stats",
            "Summarize the ingested messages: totals, date span, and the most frequent keywords, senders and channels.",
            GetConversationStatsSchema,
            async (input) => {
                const stats = await chatsift.getConversationStats(
                    {
                        start: input.since === undefined ? undefined : parseDateArgument(input.since),
                        end: input.until === undefined ? undefined : parseDateArgument(input.until),
                    },
                    input.top
                );
                return serializeStats(stats);
            }
        ),
    };
}

export function listTools(registry: ToolRegistry): ChatSiftTool[] {
    return Object.values(registry);
}
