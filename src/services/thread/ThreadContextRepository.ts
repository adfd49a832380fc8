import type { ThreadContext } from "@/messages/types";
import type { MessageStore } from "@/services/store/types";

export interface ThreadContextRepository {
    getThread(threadId: string): Promise<ThreadContext | null>;
}

/**
 * Builds thread context on demand from stored messages.
 */
export class StoreThreadContextRepository implements ThreadContextRepository {
    constructor(
        private readonly store: MessageStore,
        private readonly recentWindowSize = 5
    ) {}

    async getThread(threadId: string): Promise<ThreadContext | null> {
        const messages = await this.store.getThreadMessages(threadId);
        if (messages.length === 0) return null;

        const parentMessage = messages.find((message) => message.id === threadId) ?? null;
        const replies = messages.filter((message) => message !== parentMessage);

        return {
            threadId,
            parentMessage,
            recentMessages: replies.slice(-this.recentWindowSize),
            totalMessageCount: messages.length,
        };
    }
}
