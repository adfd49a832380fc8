/**
 * Error taxonomy shared by ingestion, search and the tool boundary.
 *
 * - EmbeddingGenerationFailedError: empty input or provider failure, not retried
 * - StoreUnavailableError: storage I/O failure, retried with backoff by ingestion
 * - InvalidMessageError: malformed input, never retried
 * - QueryTimeoutError: deadline exceeded, safe to retry
 */

export class ChatSiftError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ChatSiftError";
    }
}

export class EmbeddingGenerationFailedError extends ChatSiftError {
    constructor(
        message: string,
        public readonly modelId?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "EmbeddingGenerationFailedError";
    }
}

export class StoreUnavailableError extends ChatSiftError {
    constructor(
        public readonly operation: string,
        options?: { cause?: unknown }
    ) {
        super(`Store unavailable during ${operation}`, options);
        this.name = "StoreUnavailableError";
    }
}

export class InvalidMessageError extends ChatSiftError {
    constructor(
        message: string,
        public readonly fields: string[] = []
    ) {
        super(message);
        this.name = "InvalidMessageError";
    }
}

export class OutOfOrderMessageError extends InvalidMessageError {
    constructor(
        public readonly messageId: string,
        public readonly scope: string,
        public readonly timestamp: Date,
        public readonly watermark: Date
    ) {
        super(
            `Message ${messageId} (${timestamp.toISOString()}) is older than the latest accepted message in ${scope} (${watermark.toISOString()})`,
            ["timestamp"]
        );
        this.name = "OutOfOrderMessageError";
    }
}

export class QueryTimeoutError extends ChatSiftError {
    constructor(
        public readonly operation: string,
        public readonly timeoutMs: number
    ) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = "QueryTimeoutError";
    }
}

export class SessionNotFoundError extends ChatSiftError {
    constructor(public readonly sessionId: string) {
        super(`Search session ${sessionId} not found`);
        this.name = "SessionNotFoundError";
    }
}

export class NothingToRefineError extends ChatSiftError {
    constructor(public readonly sessionId: string) {
        super(`Search session ${sessionId} has no earlier query to refine; run a search in it first`);
        this.name = "NothingToRefineError";
    }
}
