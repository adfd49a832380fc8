import { StoreUnavailableError } from "@/lib/errors";
import { formatAnyError } from "@/lib/error-formatter";
import { readJsonFile, writeJsonFile } from "@/lib/fs";
import { cosineDistance } from "@/lib/vector";
import type { Message } from "@/messages/types";
import { logger } from "@/utils/logger";
import { MessageSnapshotSchema, serializeStoredMessage, toStoredMessage } from "./snapshot";
import type { MessageFilter, MessageStore, StoredMessage, VectorMatch } from "./types";

function matchesFilter(message: Message, filter: MessageFilter): boolean {
    if (filter.channels?.length && !filter.channels.includes(message.channel.toLowerCase())) return false;
    if (filter.users?.length && !filter.users.includes(message.sender.toLowerCase())) return false;
    const ts = message.timestamp.getTime();
    if (filter.start && ts < filter.start.getTime()) return false;
    if (filter.end && ts > filter.end.getTime()) return false;
    return true;
}

export interface InMemoryMessageStoreOptions {
    /** JSON file the store is loaded from and flushed to */
    snapshotPath?: string;
}

/**
 * Message store held in memory with an inverted keyword index and
 * brute-force cosine search. Optionally persisted as a JSON snapshot.
 */
export class InMemoryMessageStore implements MessageStore {
    private readonly records = new Map<string, StoredMessage>();
    private readonly keywordIndex = new Map<string, Set<string>>();
    private dirty = false;

    constructor(private readonly options: InMemoryMessageStoreOptions = {}) {}

    async upsert(record: StoredMessage): Promise<void> {
        const previous = this.records.get(record.message.id);
        if (previous) {
            this.unindex(previous);
        }
        this.records.set(record.message.id, record);
        for (const keyword of record.keywords) {
            let ids = this.keywordIndex.get(keyword);
            if (!ids) {
                ids = new Set();
                this.keywordIndex.set(keyword, ids);
            }
            ids.add(record.message.id);
        }
        this.dirty = true;
    }

    async updateReactions(id: string, reactions: Record<string, number>): Promise<boolean> {
        const record = this.records.get(id);
        if (!record) return false;
        const message: Message = {
            ...record.message,
            metadata: { ...record.message.metadata, reactions: { ...reactions } },
        };
        this.records.set(id, { ...record, message });
        this.dirty = true;
        return true;
    }

    async queryByVector(vector: Float32Array, topK: number, filter?: MessageFilter): Promise<VectorMatch[]> {
        const matches: VectorMatch[] = [];
        for (const [id, record] of this.records) {
            if (filter && !matchesFilter(record.message, filter)) continue;
            matches.push({ id, distance: cosineDistance(vector, record.embedding) });
        }
        matches.sort((a, b) => a.distance - b.distance);
        return matches.slice(0, topK);
    }

    async queryByKeywords(keywords: readonly string[]): Promise<string[]> {
        const ids = new Set<string>();
        for (const keyword of keywords) {
            for (const [indexed, messageIds] of this.keywordIndex) {
                if (indexed === keyword || indexed.includes(keyword)) {
                    for (const id of messageIds) ids.add(id);
                }
            }
        }
        return [...ids];
    }

    async queryByTimeRange(start: Date, end: Date): Promise<string[]> {
        const from = start.getTime();
        const to = end.getTime();
        const ids: string[] = [];
        for (const [id, record] of this.records) {
            const ts = record.message.timestamp.getTime();
            if (ts >= from && ts <= to) ids.push(id);
        }
        return ids;
    }

    async get(id: string): Promise<Message | null> {
        return this.records.get(id)?.message ?? null;
    }

    async getRecord(id: string): Promise<StoredMessage | null> {
        return this.records.get(id) ?? null;
    }

    async getThreadMessages(threadId: string): Promise<Message[]> {
        const messages: Message[] = [];
        for (const record of this.records.values()) {
            if (record.message.id === threadId || record.message.threadId === threadId) {
                messages.push(record.message);
            }
        }
        return messages.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    }

    async count(): Promise<number> {
        return this.records.size;
    }

    async listRecords(): Promise<StoredMessage[]> {
        return [...this.records.values()].sort(
            (a, b) => a.message.timestamp.getTime() - b.message.timestamp.getTime()
        );
    }

    /**
     * Replace the in-memory contents with the snapshot file, if one exists
     */
    async load(): Promise<void> {
        const snapshotPath = this.options.snapshotPath;
        if (!snapshotPath) return;

        let raw: unknown;
        try {
            raw = await readJsonFile(snapshotPath);
        } catch (error) {
            throw new StoreUnavailableError("load", { cause: error });
        }
        if (raw === null) return;

        const snapshot = MessageSnapshotSchema.parse(raw);
        this.records.clear();
        this.keywordIndex.clear();
        for (const entry of snapshot.messages) {
            await this.upsert(toStoredMessage(entry));
        }
        this.dirty = false;
        logger.debug(`Loaded ${this.records.size} messages from ${snapshotPath}`);
    }

    /**
     * Write the snapshot file when anything changed since the last flush
     */
    async flush(): Promise<void> {
        const snapshotPath = this.options.snapshotPath;
        if (!snapshotPath || !this.dirty) return;

        try {
            await writeJsonFile(snapshotPath, {
                version: 1,
                messages: [...this.records.values()].map(serializeStoredMessage),
            });
            this.dirty = false;
        } catch (error) {
            logger.error(`Failed to write message snapshot: ${formatAnyError(error)}`);
            throw new StoreUnavailableError("flush", { cause: error });
        }
    }

    private unindex(record: StoredMessage): void {
        for (const keyword of record.keywords) {
            const ids = this.keywordIndex.get(keyword);
            if (!ids) continue;
            ids.delete(record.message.id);
            if (ids.size === 0) this.keywordIndex.delete(keyword);
        }
    }
}
