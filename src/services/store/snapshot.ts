import { z } from "zod";
import { MessageInputSchema } from "@/messages/schema";
import type { Message } from "@/messages/types";
import type { DeduplicationRecord, StoredMessage } from "./types";

/**
 * JSON snapshot formats for the in-process store and dedup index
 */

const DateSchema = z.coerce.date();

const StoredMessageSnapshotSchema = z.object({
    message: MessageInputSchema.extend({ id: z.string().min(1) }),
    embedding: z.array(z.number()),
    keywords: z.array(z.string()),
});

export const MessageSnapshotSchema = z.object({
    version: z.literal(1),
    messages: z.array(StoredMessageSnapshotSchema),
});

const DedupRecordSnapshotSchema = z.object({
    dedupKey: z.string(),
    messageId: z.string(),
    contentHash: z.string(),
    version: z.number().int().positive(),
    lastReactions: z.record(z.number()),
    editedAt: DateSchema.optional(),
    timestamp: DateSchema,
});

export const DedupSnapshotSchema = z.object({
    version: z.literal(1),
    records: z.array(DedupRecordSnapshotSchema),
    watermarks: z.record(DateSchema),
    retryPending: z.array(z.string()).default([]),
});

export function toStoredMessage(snapshot: z.infer<typeof StoredMessageSnapshotSchema>): StoredMessage {
    const message: Message = { ...snapshot.message };
    return {
        message,
        embedding: Float32Array.from(snapshot.embedding),
        keywords: snapshot.keywords,
    };
}

export function serializeStoredMessage(record: StoredMessage): z.input<typeof StoredMessageSnapshotSchema> {
    return {
        message: record.message,
        embedding: Array.from(record.embedding),
        keywords: record.keywords,
    };
}

export function toDedupRecord(snapshot: z.infer<typeof DedupRecordSnapshotSchema>): DeduplicationRecord {
    return { ...snapshot };
}
