import { z } from "zod";
import { InvalidMessageError } from "@/lib/errors";
import type { DedupKeyPolicy } from "./dedupKey";
import { deriveMessageId } from "./dedupKey";
import type { Message } from "./types";

/**
 * Inbound message validation.
 *
 * Handles:
 * - Trimmed non-empty sender, content and channel
 * - Timestamps as Date, ISO 8601 string or Unix milliseconds
 * - Optional caller id (derived from the dedup key when absent)
 */

const DateInputSchema = z
    .union([z.date(), z.string(), z.number()])
    .transform((value, ctx) => {
        const date = value instanceof Date ? value : new Date(value);
        if (Number.isNaN(date.getTime())) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid date" });
            return z.NEVER;
        }
        return date;
    });

const NonEmptyTrimmed = z.string().trim().min(1, "Must not be empty");

// Content keeps its original spacing; only the emptiness check trims
const NonBlankContent = z.string().refine((value) => value.trim().length > 0, "Must not be empty");

export const MessageTypeSchema = z.enum(["regular", "thread", "reply", "system", "bot"]);

export const MessageMetadataSchema = z.object({
    editedAt: DateInputSchema.optional(),
    reactions: z.record(z.number().int().nonnegative()).optional(),
    mentions: z.array(z.string()).optional(),
    attachmentNames: z.array(z.string()).optional(),
    contentHash: z.string().optional(),
    version: z.number().int().positive().optional(),
});

export const MessageInputSchema = z.object({
    id: z.string().trim().min(1).optional(),
    timestamp: DateInputSchema,
    sender: NonEmptyTrimmed,
    content: NonBlankContent,
    channel: NonEmptyTrimmed,
    threadId: z.string().trim().min(1).optional(),
    messageType: MessageTypeSchema.default("regular"),
    metadata: MessageMetadataSchema.optional(),
});

export type MessageInput = z.input<typeof MessageInputSchema>;

/**
 * Validate raw input into a Message.
 *
 * @throws InvalidMessageError listing every offending field
 */
export function parseMessage(input: unknown, policy: DedupKeyPolicy = "message-id"): Message {
    const result = MessageInputSchema.safeParse(input);
    if (!result.success) {
        const fields = [...new Set(result.error.issues.map((issue) => issue.path.join(".") || "(root)"))];
        throw new InvalidMessageError(`Invalid message: ${fields.join(", ")}`, fields);
    }

    const data = result.data;
    return {
        id: data.id ?? deriveMessageId(data, policy),
        timestamp: data.timestamp,
        sender: data.sender,
        content: data.content,
        channel: data.channel,
        threadId: data.threadId,
        messageType: data.messageType,
        metadata: data.metadata,
    };
}
