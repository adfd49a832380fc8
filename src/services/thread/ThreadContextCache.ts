import { Mutex } from "@/lib/async";
import type { ThreadContext } from "@/messages/types";
import type { ThreadContextRepository } from "./ThreadContextRepository";

/**
 * Caches thread contexts in front of a repository. The cache is the only
 * owner of its map; reads, fills and invalidations are serialized.
 */
export class ThreadContextCache implements ThreadContextRepository {
    private readonly entries = new Map<string, ThreadContext | null>();
    private readonly mutex = new Mutex();
    private hits = 0;
    private misses = 0;

    constructor(private readonly source: ThreadContextRepository) {}

    getThread(threadId: string): Promise<ThreadContext | null> {
        return this.mutex.runExclusive(async () => {
            if (this.entries.has(threadId)) {
                this.hits++;
                return this.entries.get(threadId) ?? null;
            }
            this.misses++;
            const context = await this.source.getThread(threadId);
            this.entries.set(threadId, context);
            return context;
        });
    }

    invalidate(threadId: string): Promise<void> {
        return this.mutex.runExclusive(() => {
            this.entries.delete(threadId);
        });
    }

    getStats(): { hits: number; misses: number; size: number } {
        return { hits: this.hits, misses: this.misses, size: this.entries.size };
    }
}
