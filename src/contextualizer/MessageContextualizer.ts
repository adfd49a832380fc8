/**
 * MessageContextualizer - gives short, low-signal messages enough context to
 * be searchable.
 *
 * Handles:
 * - Short-message detection (length threshold, lexicon hit, emoji-only)
 * - Thread-aware enhancement text used for embeddings
 * - Contextual meaning ("👍" under a deploy question reads as approval of it)
 * - Conversation chunking and chunk embeddings
 */

import { format } from "date-fns";
import type { ConversationChunk, Message, ThreadContext } from "@/messages/types";
import type { EmbeddingProvider } from "@/services/embedding/EmbeddingProvider";
import type { ThreadContextRepository } from "@/services/thread/ThreadContextRepository";
import { type ChunkingOptions, chunkEmbeddingText, createConversationChunks } from "./ConversationChunker";
import {
    type ShortMessageLexicon,
    type ShortSignal,
    describeSignal,
    getDefaultLexicon,
    isEmojiOnly,
} from "./ShortMessageLexicon";

export interface ContextualizerOptions {
    shortMessageThreshold: number;
    channelTopics: Record<string, string>;
    lexicon?: ShortMessageLexicon;
}

function quote(message: Message): string {
    return `"${message.content.trim()}"`;
}

function speaker(message: Message): string {
    return `${message.sender}: ${message.content.trim()}`;
}

export class MessageContextualizer {
    private readonly lexicon: ShortMessageLexicon;

    constructor(
        private readonly embeddingProvider: EmbeddingProvider,
        private readonly threadRepository: ThreadContextRepository,
        private readonly options: ContextualizerOptions
    ) {
        this.lexicon = options.lexicon ?? getDefaultLexicon();
    }

    isShortMessage(content: string): boolean {
        const trimmed = content.trim();
        return (
            Array.from(trimmed).length <= this.options.shortMessageThreshold ||
            this.lexicon.lookup(trimmed) !== null ||
            isEmojiOnly(trimmed)
        );
    }

    describeChannel(channel: string): string {
        const topic = this.options.channelTopics[channel.toLowerCase()];
        return topic ? `#${channel} (${topic})` : `#${channel}`;
    }

    /**
     * Text to embed in place of the raw content. Short thread replies carry the
     * thread around them; everything else gets a labelled description.
     */
    async enhanceWithThreadContext(message: Message): Promise<string> {
        const signal = this.lexicon.lookup(message.content);

        if (message.threadId && this.isShortMessage(message.content)) {
            const context = await this.threadRepository.getThread(message.threadId);
            if (context) {
                return this.describeInThread(message, context, signal);
            }
        }

        const lines = [
            `Channel: ${this.describeChannel(message.channel)}`,
            `Time: ${format(message.timestamp, "yyyy-MM-dd HH:mm")}`,
            `Sender: ${message.sender}`,
            `Content: ${message.content.trim()}`,
        ];
        if (signal) {
            lines.push(`Meaning: ${describeSignal(signal)}`);
        }
        return lines.join("\n");
    }

    /**
     * Interpretation of a short message. Returns null for messages above the
     * short threshold, and for short messages with neither a lexicon entry nor
     * a thread parent to interpret them by.
     */
    async extractContextualMeaning(message: Message, threadContext?: ThreadContext | null): Promise<string | null> {
        if (!this.isShortMessage(message.content)) {
            return null;
        }

        let context = threadContext ?? null;
        if (threadContext === undefined && message.threadId) {
            context = await this.threadRepository.getThread(message.threadId);
        }
        const parent = this.parentOf(message, context);
        const signal = this.lexicon.lookup(message.content);

        if (signal) {
            const gloss = describeSignal(signal);
            return parent ? `${gloss} in response to: ${quote(parent)}` : gloss;
        }
        if (parent) {
            return `short reply ${quote(message)} in response to: ${quote(parent)}`;
        }
        return null;
    }

    createConversationChunks(messages: readonly Message[], options: ChunkingOptions): ConversationChunk[] {
        return createConversationChunks(messages, options);
    }

    async generateContextualEmbedding(message: Message): Promise<Float32Array> {
        return this.embeddingProvider.embed(await this.enhanceWithThreadContext(message));
    }

    async generateChunkEmbedding(chunk: ConversationChunk): Promise<Float32Array> {
        return this.embeddingProvider.embed(chunkEmbeddingText(chunk));
    }

    private parentOf(message: Message, context: ThreadContext | null): Message | null {
        const parent = context?.parentMessage ?? null;
        return parent && parent.id !== message.id ? parent : null;
    }

    private describeInThread(message: Message, context: ThreadContext, signal: ShortSignal | null): string {
        const parent = this.parentOf(message, context);
        const recent = context.recentMessages.filter((m) => m.id !== message.id);

        const lines = [`Thread context: ${parent ? speaker(parent) : "(parent message not captured)"}`];
        if (recent.length > 0) {
            lines.push(`Recent: ${recent.map(speaker).join(" | ")}`);
        }
        const meaning = signal ? ` (${describeSignal(signal)})` : "";
        lines.push(`Current: ${speaker(message)}${meaning}`);
        lines.push(`Channel: ${this.describeChannel(message.channel)}`);
        return lines.join("\n");
    }
}
