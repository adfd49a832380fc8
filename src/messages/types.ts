export type MessageType = "regular" | "thread" | "reply" | "system" | "bot";

export interface MessageMetadata {
    editedAt?: Date;
    /** Emoji glyph (or shortcode) to count */
    reactions?: Record<string, number>;
    mentions?: string[];
    attachmentNames?: string[];
    contentHash?: string;
    version?: number;
}

export interface Message {
    id: string;
    timestamp: Date;
    sender: string;
    content: string;
    channel: string;
    threadId?: string;
    messageType: MessageType;
    metadata?: MessageMetadata;
}

export interface ThreadContext {
    threadId: string;
    parentMessage: Message | null;
    /** Oldest first, bounded by the configured window */
    recentMessages: Message[];
    totalMessageCount: number;
}

export interface TimeWindow {
    start: Date;
    end: Date;
}

export interface ConversationChunk {
    id: string;
    topic: string;
    messages: Message[];
    timeWindow: TimeWindow;
    participants: string[];
    participantCount: number;
    summary: string;
}
