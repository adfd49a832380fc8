import { Semaphore, withTimeout } from "@/lib/async";
import { logger } from "@/utils/logger";
import { type EmbeddingProvider, assertEmbeddableTexts } from "./EmbeddingProvider";

export interface EmbeddingGuardOptions {
    concurrency: number;
    timeoutMs: number;
}

/**
 * Wraps a provider so that at most `concurrency` calls are in flight and each
 * call fails with QueryTimeoutError once `timeoutMs` elapses. Time spent
 * waiting for a slot does not count towards the deadline.
 */
export class GuardedEmbeddingProvider implements EmbeddingProvider {
    private readonly pool: Semaphore;

    constructor(
        private readonly inner: EmbeddingProvider,
        private readonly options: EmbeddingGuardOptions
    ) {
        this.pool = new Semaphore(options.concurrency);
    }

    public async embed(text: string): Promise<Float32Array> {
        assertEmbeddableTexts([text], this.getModelId());
        return this.pool.run(() =>
            withTimeout(this.inner.embed(text), this.options.timeoutMs, "embedding generation")
        );
    }

    public async embedBatch(texts: string[]): Promise<Float32Array[]> {
        assertEmbeddableTexts(texts, this.getModelId());
        if (texts.length === 0) return [];
        logger.debug(`Embedding batch of ${texts.length} texts with ${this.getModelId()}`);
        return this.pool.run(() =>
            withTimeout(this.inner.embedBatch(texts), this.options.timeoutMs, "batch embedding generation")
        );
    }

    public getDimensions(): Promise<number> {
        return this.inner.getDimensions();
    }

    public getModelId(): string {
        return this.inner.getModelId();
    }

    get queuedCalls(): number {
        return this.pool.pending;
    }
}
