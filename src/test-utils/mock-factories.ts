import type { Message } from "@/messages/types";
import type { EmbeddingProvider } from "@/services/embedding/EmbeddingProvider";
import type { StoredMessage } from "@/services/store/types";
import { extractKeywords } from "@/search/KeywordExtractor";

/**
 * Factory functions for creating test objects
 */

let counter = 0;

export function createMockMessage(overrides: Partial<Message> = {}): Message {
    counter++;
    return {
        id: overrides.id ?? `msg-${counter}`,
        timestamp: overrides.timestamp ?? new Date(2024, 5, 15, 10, 0, 0),
        sender: overrides.sender ?? "alice",
        content: overrides.content ?? "Mock message content",
        channel: overrides.channel ?? "engineering",
        messageType: overrides.messageType ?? (overrides.threadId ? "reply" : "regular"),
        ...(overrides.threadId ? { threadId: overrides.threadId } : {}),
        ...(overrides.metadata ? { metadata: overrides.metadata } : {}),
    };
}

export function createStoredMessage(message: Message, embedding: number[]): StoredMessage {
    return {
        message,
        embedding: new Float32Array(embedding),
        keywords: extractKeywords(message.content),
    };
}

/**
 * Embedding provider returning fixed vectors. Texts without an explicit
 * vector get `fallback`.
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
    readonly calls: string[] = [];

    constructor(
        private readonly vectors: Record<string, number[]> = {},
        private readonly fallback: number[] = [1, 0]
    ) {}

    async embed(text: string): Promise<Float32Array> {
        this.calls.push(text);
        return new Float32Array(this.vectors[text] ?? this.fallback);
    }

    async embedBatch(texts: string[]): Promise<Float32Array[]> {
        return Promise.all(texts.map((text) => this.embed(text)));
    }

    async getDimensions(): Promise<number> {
        return this.fallback.length;
    }

    getModelId(): string {
        return "stub";
    }
}
