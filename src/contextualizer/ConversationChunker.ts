/**
 * Groups messages into time-coherent conversation chunks.
 *
 * A new chunk starts when a message is more than the window after the chunk's
 * first message (so any gap wider than the window also splits) or when the
 * chunk is full. Every input message lands in exactly one chunk.
 */

import { sha256 } from "@/lib/hash";
import type { ConversationChunk, Message } from "@/messages/types";
import { topKeywords } from "@/search/KeywordExtractor";

export interface ChunkingOptions {
    timeWindowMs: number;
    maxChunkSize: number;
}

const TOPIC_KEYWORDS = 3;
const FALLBACK_TOPIC = "general discussion";

function plural(count: number, word: string): string {
    return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export function buildChunk(messages: Message[]): ConversationChunk {
    const participants: string[] = [];
    for (const message of messages) {
        if (!participants.includes(message.sender)) participants.push(message.sender);
    }

    const keywords = topKeywords(
        messages.map((message) => message.content),
        TOPIC_KEYWORDS
    );
    const topic = keywords.length > 0 ? keywords.join(", ") : FALLBACK_TOPIC;

    return {
        id: `chunk_${sha256(...messages.map((message) => message.id)).slice(0, 16)}`,
        topic,
        messages,
        timeWindow: {
            start: messages[0].timestamp,
            end: messages[messages.length - 1].timestamp,
        },
        participants,
        participantCount: participants.length,
        summary: `${plural(messages.length, "message")} from ${plural(participants.length, "participant")} about ${topic}`,
    };
}

export function createConversationChunks(
    messages: readonly Message[],
    options: ChunkingOptions
): ConversationChunk[] {
    if (options.maxChunkSize < 1) {
        throw new RangeError(`maxChunkSize must be at least 1, got ${options.maxChunkSize}`);
    }
    if (options.timeWindowMs < 0) {
        throw new RangeError(`timeWindow must not be negative, got ${options.timeWindowMs}`);
    }

    // Stable sort keeps capture order for equal timestamps
    const sorted = [...messages].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    const groups: Message[][] = [];
    let current: Message[] = [];

    for (const message of sorted) {
        if (current.length > 0) {
            const span = message.timestamp.getTime() - current[0].timestamp.getTime();
            if (span > options.timeWindowMs || current.length >= options.maxChunkSize) {
                groups.push(current);
                current = [];
            }
        }
        current.push(message);
    }
    if (current.length > 0) groups.push(current);

    return groups.map(buildChunk);
}

/**
 * Text used to embed a chunk
 */
export function chunkEmbeddingText(chunk: ConversationChunk, sampleSize = 5): string {
    const sample = chunk.messages
        .slice(0, sampleSize)
        .map((message) => `${message.sender}: ${message.content.trim()}`);
    return [
        `Topic: ${chunk.topic}`,
        `Summary: ${chunk.summary}`,
        `Participants: ${chunk.participants.join(", ")}`,
        `Messages: ${sample.join(" | ")}`,
    ].join("\n");
}
