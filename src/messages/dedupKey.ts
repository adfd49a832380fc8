import { sha256 } from "@/lib/hash";
import type { Message } from "./types";

/**
 * How a message is identified across repeated captures.
 *
 * - "message-id": the caller's id scoped by channel, falling back to sender + timestamp
 * - "sender-timestamp": always sender + timestamp scoped by channel
 *
 * Content never takes part in the key, so an edit maps to the same key.
 */
export type DedupKeyPolicy = "message-id" | "sender-timestamp";

type KeySource = Pick<Message, "channel" | "sender" | "timestamp"> & { id?: string };

function senderTimestampKey(message: KeySource): string {
    return `${message.channel}:${message.sender}:${message.timestamp.toISOString()}`;
}

export function computeDedupKey(message: KeySource, policy: DedupKeyPolicy): string {
    switch (policy) {
        case "message-id":
            return message.id ? `${message.channel}:${message.id}` : senderTimestampKey(message);
        case "sender-timestamp":
            return senderTimestampKey(message);
    }
}

/**
 * Stable id for messages captured without one
 */
export function deriveMessageId(message: KeySource, policy: DedupKeyPolicy): string {
    const key = computeDedupKey({ ...message, id: undefined }, policy);
    return `msg_${sha256(key).slice(0, 16)}`;
}

export function computeContentHash(message: Pick<Message, "content" | "sender" | "timestamp">): string {
    return sha256(message.content, message.sender, message.timestamp.toISOString());
}
