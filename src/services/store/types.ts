import type { Message } from "@/messages/types";

export interface StoredMessage {
    message: Message;
    embedding: Float32Array;
    keywords: string[];
}

export interface VectorMatch {
    id: string;
    /** Cosine distance, 0 for identical direction */
    distance: number;
}

/**
 * Hard constraints a vector query is restricted to. Channels and users are
 * lowercase and compared case-insensitively; times are inclusive.
 */
export interface MessageFilter {
    channels?: readonly string[];
    users?: readonly string[];
    start?: Date;
    end?: Date;
}

/**
 * Vector, keyword and time primitives over stored messages.
 * Implementations throw StoreUnavailableError on I/O failure.
 */
export interface MessageStore {
    upsert(record: StoredMessage): Promise<void>;
    /** Returns false when the message is unknown */
    updateReactions(id: string, reactions: Record<string, number>): Promise<boolean>;
    /** Nearest messages first, drawn only from those passing the filter when one is given */
    queryByVector(vector: Float32Array, topK: number, filter?: MessageFilter): Promise<VectorMatch[]>;
    /** Ids of messages sharing at least one keyword (exact or containing) */
    queryByKeywords(keywords: readonly string[]): Promise<string[]>;
    /** Ids of messages with start <= timestamp <= end */
    queryByTimeRange(start: Date, end: Date): Promise<string[]>;
    get(id: string): Promise<Message | null>;
    getRecord(id: string): Promise<StoredMessage | null>;
    /** The thread's parent (id === threadId) and replies, oldest first */
    getThreadMessages(threadId: string): Promise<Message[]>;
    count(): Promise<number>;
    /** Every stored message, oldest first */
    listRecords(): Promise<StoredMessage[]>;
}

export interface DeduplicationRecord {
    dedupKey: string;
    messageId: string;
    contentHash: string;
    version: number;
    lastReactions: Record<string, number>;
    editedAt?: Date;
    timestamp: Date;
}

/**
 * Persistent key -> record index behind the deduplication gate, plus the
 * per-scope timestamp watermarks used for ordering checks.
 */
export interface DedupIndex {
    get(key: string): Promise<DeduplicationRecord | null>;
    put(record: DeduplicationRecord): Promise<void>;
    delete(key: string): Promise<void>;
    getWatermark(scope: string): Promise<Date | null>;
    /** null clears the scope's watermark */
    setWatermark(scope: string, timestamp: Date | null): Promise<void>;
    /** Keys rolled back after a later message in their scope was accepted; exempt from the ordering check */
    isRetryPending(key: string): Promise<boolean>;
    setRetryPending(key: string, pending: boolean): Promise<void>;
    size(): Promise<number>;
}
