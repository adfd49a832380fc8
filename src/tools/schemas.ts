import { z } from "zod";
import { MessageInputSchema } from "@/messages/schema";

/**
 * Request schemas for the operations exposed at the tool boundary
 */

const DateArgument = z
    .union([z.string(), z.number()])
    .describe("Unix timestamp in seconds or ISO 8601 date");

export const IngestMessageSchema = MessageInputSchema.describe(
    "A captured chat message. Omit id to derive one from channel, sender and timestamp."
);

export const SearchMessagesSchema = z.object({
    query: z
        .string()
        .min(1)
        .describe(
            "Natural-language query, e.g. 'deployment issues from alice in #engineering yesterday'"
        ),
    limit: z.number().int().positive().max(100).optional().describe("Maximum number of results. Defaults to 10."),
    channels: z.array(z.string()).optional().describe("Only messages from these channels"),
    users: z.array(z.string()).optional().describe("Only messages from these senders"),
    since: DateArgument.optional(),
    until: DateArgument.optional(),
    minScore: z.number().min(0).max(1).optional().describe("Minimum combined relevance score (0-1)"),
    sessionId: z
        .string()
        .optional()
        .describe("Continue a conversational search session; earlier queries in the session add context"),
});

export const GetThreadContextSchema = z.object({
    threadId: z.string().min(1).describe("Id of the thread (the parent message id)"),
});

export const GetContextualMeaningSchema = z.object({
    messageId: z.string().min(1).describe("Id of a stored message"),
});

export const CreateChunksSchema = z.object({
    messages: z.array(MessageInputSchema).describe("Messages to group into conversation chunks"),
    timeWindowSeconds: z.number().positive().optional().describe("Maximum span of one chunk in seconds"),
    maxChunkSize: z.number().int().positive().optional().describe("Maximum messages per chunk"),
});

export const GetConversationStatsSchema = z.object({
    since: DateArgument.optional(),
    until: DateArgument.optional(),
    top: z.number().int().positive().max(100).optional().describe("How many keywords, senders and channels to list. Defaults to 10."),
});

export type SearchMessagesInput = z.infer<typeof SearchMessagesSchema>;
export type CreateChunksInput = z.infer<typeof CreateChunksSchema>;
