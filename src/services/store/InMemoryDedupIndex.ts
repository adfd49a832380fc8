import { StoreUnavailableError } from "@/lib/errors";
import { readJsonFile, writeJsonFile } from "@/lib/fs";
import { logger } from "@/utils/logger";
import { DedupSnapshotSchema, toDedupRecord } from "./snapshot";
import type { DedupIndex, DeduplicationRecord } from "./types";

export interface InMemoryDedupIndexOptions {
    snapshotPath?: string;
}

export class InMemoryDedupIndex implements DedupIndex {
    private readonly records = new Map<string, DeduplicationRecord>();
    private readonly watermarks = new Map<string, Date>();
    private readonly retryPending = new Set<string>();
    private dirty = false;

    constructor(private readonly options: InMemoryDedupIndexOptions = {}) {}

    async get(key: string): Promise<DeduplicationRecord | null> {
        const record = this.records.get(key);
        return record ? { ...record, lastReactions: { ...record.lastReactions } } : null;
    }

    async put(record: DeduplicationRecord): Promise<void> {
        this.records.set(record.dedupKey, { ...record, lastReactions: { ...record.lastReactions } });
        this.dirty = true;
    }

    async delete(key: string): Promise<void> {
        this.dirty = this.records.delete(key) || this.dirty;
    }

    async getWatermark(scope: string): Promise<Date | null> {
        return this.watermarks.get(scope) ?? null;
    }

    async setWatermark(scope: string, timestamp: Date | null): Promise<void> {
        if (timestamp) {
            this.watermarks.set(scope, timestamp);
        } else {
            this.watermarks.delete(scope);
        }
        this.dirty = true;
    }

    async isRetryPending(key: string): Promise<boolean> {
        return this.retryPending.has(key);
    }

    async setRetryPending(key: string, pending: boolean): Promise<void> {
        const changed = pending ? !this.retryPending.has(key) : this.retryPending.has(key);
        if (!changed) return;
        if (pending) {
            this.retryPending.add(key);
        } else {
            this.retryPending.delete(key);
        }
        this.dirty = true;
    }

    async size(): Promise<number> {
        return this.records.size;
    }

    async load(): Promise<void> {
        const snapshotPath = this.options.snapshotPath;
        if (!snapshotPath) return;

        let raw: unknown;
        try {
            raw = await readJsonFile(snapshotPath);
        } catch (error) {
            throw new StoreUnavailableError("load dedup index", { cause: error });
        }
        if (raw === null) return;

        const snapshot = DedupSnapshotSchema.parse(raw);
        this.records.clear();
        this.watermarks.clear();
        this.retryPending.clear();
        for (const record of snapshot.records) {
            this.records.set(record.dedupKey, toDedupRecord(record));
        }
        for (const [scope, timestamp] of Object.entries(snapshot.watermarks)) {
            this.watermarks.set(scope, timestamp);
        }
        for (const key of snapshot.retryPending) {
            this.retryPending.add(key);
        }
        this.dirty = false;
        logger.debug(`Loaded ${this.records.size} dedup records from ${snapshotPath}`);
    }

    async flush(): Promise<void> {
        const snapshotPath = this.options.snapshotPath;
        if (!snapshotPath || !this.dirty) return;

        try {
            await writeJsonFile(snapshotPath, {
                version: 1,
                records: [...this.records.values()],
                watermarks: Object.fromEntries(this.watermarks),
                retryPending: [...this.retryPending],
            });
            this.dirty = false;
        } catch (error) {
            throw new StoreUnavailableError("flush dedup index", { cause: error });
        }
    }
}
