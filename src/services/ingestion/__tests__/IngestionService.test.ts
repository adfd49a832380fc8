import { beforeEach, describe, expect, it, vi } from "vitest";
import { MessageContextualizer } from "@/contextualizer/MessageContextualizer";
import { DeduplicationGate } from "@/dedup/DeduplicationGate";
import { fixedClock } from "@/lib/clock";
import { EmbeddingGenerationFailedError, OutOfOrderMessageError, StoreUnavailableError } from "@/lib/errors";
import type { Message } from "@/messages/types";
import { IngestionService } from "@/services/ingestion/IngestionService";
import { InMemoryDedupIndex } from "@/services/store/InMemoryDedupIndex";
import { InMemoryMessageStore } from "@/services/store/InMemoryMessageStore";
import type { StoredMessage } from "@/services/store/types";
import { StoreThreadContextRepository } from "@/services/thread/ThreadContextRepository";
import { ThreadContextCache } from "@/services/thread/ThreadContextCache";
import { StubEmbeddingProvider, createMockMessage } from "@/test-utils";
import { logger } from "@/utils/logger";

vi.mock("@/utils/logger", () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

/**
 * Store whose upserts fail with StoreUnavailableError a set number of times
 */
class FlakyMessageStore extends InMemoryMessageStore {
    upsertAttempts = 0;

    constructor(private failuresLeft: number) {
        super();
    }

    override async upsert(record: StoredMessage): Promise<void> {
        this.upsertAttempts++;
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new StoreUnavailableError("upsert");
        }
        await super.upsert(record);
    }
}

class FailingEmbeddingProvider extends StubEmbeddingProvider {
    override async embed(text: string): Promise<Float32Array> {
        this.calls.push(text);
        throw new EmbeddingGenerationFailedError("model offline", "stub");
    }
}

const now = new Date(2024, 5, 15, 12, 0, 0);

describe("IngestionService", () => {
    let dedupIndex: InMemoryDedupIndex;
    let gate: DeduplicationGate;
    let embeddings: StubEmbeddingProvider;
    let parent: Message;
    let threads: ThreadContextCache;

    function createService(store: InMemoryMessageStore, maxAttempts = 3): IngestionService {
        threads = new ThreadContextCache(new StoreThreadContextRepository(store));
        const contextualizer = new MessageContextualizer(embeddings, threads, {
            shortMessageThreshold: 10,
            channelTopics: { engineering: "software development" },
        });
        return new IngestionService(gate, store, contextualizer, threads, { maxAttempts, retryBaseMs: 0 });
    }

    beforeEach(() => {
        vi.clearAllMocks();
        dedupIndex = new InMemoryDedupIndex();
        gate = new DeduplicationGate(dedupIndex, { clock: fixedClock(now) });
        embeddings = new StubEmbeddingProvider();
        parent = createMockMessage({
            id: "p-1",
            sender: "alice",
            content: "Should we deploy the API changes? Tests are passing.",
            timestamp: new Date(2024, 5, 15, 10, 0, 0),
        });
    });

    describe("ingest", () => {
        it("should store new messages with dedup metadata", async () => {
            const store = new InMemoryMessageStore();
            const service = createService(store);

            const outcome = await service.ingest(parent);

            expect(outcome.result.kind).toBe("new");
            expect(outcome.contextualMeaning).toBeNull();
            const stored = await store.get("p-1");
            expect(stored?.metadata?.version).toBe(1);
            expect(stored?.metadata?.reactions).toEqual({});
            expect(stored?.metadata?.contentHash).toBe(outcome.result.record.contentHash);
        });

        it("should skip duplicates without embedding them again", async () => {
            const service = createService(new InMemoryMessageStore());

            await service.ingest(parent);
            const outcome = await service.ingest({ ...parent });

            expect(outcome.result.kind).toBe("duplicate");
            expect(embeddings.calls).toHaveLength(1);
        });

        it("should update reactions without re-embedding", async () => {
            const store = new InMemoryMessageStore();
            const service = createService(store);

            await service.ingest(parent);
            const outcome = await service.ingest({ ...parent, metadata: { reactions: { "👍": 2 } } });

            expect(outcome.result.kind).toBe("reactionsUpdated");
            expect(embeddings.calls).toHaveLength(1);
            const stored = await store.get("p-1");
            expect(stored?.metadata?.reactions).toEqual({ "👍": 2 });
            expect(stored?.metadata?.version).toBe(1);
        });

        it("should re-embed edited messages with a new version", async () => {
            const store = new InMemoryMessageStore();
            const service = createService(store);

            await service.ingest(parent);
            const outcome = await service.ingest({ ...parent, content: "Should we deploy the API changes tomorrow?" });

            expect(outcome.result.kind).toBe("updated");
            expect(embeddings.calls).toHaveLength(2);
            const stored = await store.get("p-1");
            expect(stored?.content).toBe("Should we deploy the API changes tomorrow?");
            expect(stored?.metadata?.version).toBe(2);
            expect(stored?.metadata?.editedAt).toEqual(now);
        });

        it("should return the contextual meaning of short thread replies", async () => {
            const service = createService(new InMemoryMessageStore());
            await service.ingest(parent);

            const outcome = await service.ingest(
                createMockMessage({
                    id: "r-1",
                    sender: "bob",
                    content: "👍",
                    threadId: "p-1",
                    timestamp: new Date(2024, 5, 15, 10, 5, 0),
                })
            );

            expect(outcome.contextualMeaning).toBe(
                'approval confirmation in response to: "Should we deploy the API changes? Tests are passing."'
            );
        });

        it("should retry store writes that fail transiently", async () => {
            const store = new FlakyMessageStore(2);
            const service = createService(store, 3);

            const outcome = await service.ingest(parent);

            expect(outcome.result.kind).toBe("new");
            expect(store.upsertAttempts).toBe(3);
            expect(await store.get("p-1")).not.toBeNull();
            expect(logger.warn).toHaveBeenCalledTimes(2);
        });

        it("should roll back the classification when the write keeps failing", async () => {
            const store = new FlakyMessageStore(5);
            const service = createService(store, 2);

            await expect(service.ingest(parent)).rejects.toBeInstanceOf(StoreUnavailableError);

            expect(store.upsertAttempts).toBe(2);
            expect(await dedupIndex.get(gate.keyFor(parent))).toBeNull();

            const retried = await createService(new InMemoryMessageStore()).ingest(parent);
            expect(retried.result.kind).toBe("new");
        });

        it("should restore the previous record when an edit cannot be written", async () => {
            const store = new FlakyMessageStore(0);
            const service = createService(store, 1);
            await service.ingest(parent);
            const before = await dedupIndex.get(gate.keyFor(parent));

            const failing = new FlakyMessageStore(1);
            await expect(
                createService(failing, 1).ingest({ ...parent, content: "Rewritten question" })
            ).rejects.toBeInstanceOf(StoreUnavailableError);

            expect(await dedupIndex.get(gate.keyFor(parent))).toEqual(before);
        });

        it("should refresh cached thread context after a reaction-only update", async () => {
            const service = createService(new InMemoryMessageStore());
            const reply = createMockMessage({
                id: "r-1",
                sender: "bob",
                content: "Deploying after lunch then",
                threadId: "p-1",
                timestamp: new Date(2024, 5, 15, 10, 5, 0),
            });
            await service.ingest(parent);
            await service.ingest(reply);
            expect((await threads.getThread("p-1"))?.recentMessages[0].metadata?.reactions).toEqual({});

            const outcome = await service.ingest({ ...reply, metadata: { reactions: { "🚀": 3 } } });

            expect(outcome.result.kind).toBe("reactionsUpdated");
            const context = await threads.getThread("p-1");
            expect(context?.recentMessages[0].metadata?.reactions).toEqual({ "🚀": 3 });
        });

        it("should accept older messages again once a failed write releases the watermark", async () => {
            const service = createService(new FlakyMessageStore(1), 1);
            await expect(service.ingest(parent)).rejects.toBeInstanceOf(StoreUnavailableError);

            const earlier = createMockMessage({ id: "m-early", timestamp: new Date(2024, 5, 15, 9, 0, 0) });
            const outcome = await service.ingest(earlier);

            expect(outcome.result.kind).toBe("new");
            expect(await dedupIndex.getWatermark("engineering")).toEqual(earlier.timestamp);
        });

        it("should not retry embedding failures", async () => {
            embeddings = new FailingEmbeddingProvider();
            const store = new InMemoryMessageStore();
            const service = createService(store);

            await expect(service.ingest(parent)).rejects.toBeInstanceOf(EmbeddingGenerationFailedError);

            expect(embeddings.calls).toHaveLength(1);
            expect(await store.count()).toBe(0);
            expect(await dedupIndex.get(gate.keyFor(parent))).toBeNull();
        });
    });

    describe("ingestBatch", () => {
        it("should count every outcome and keep going past failures", async () => {
            const service = createService(new InMemoryMessageStore());
            const reply = createMockMessage({
                id: "r-1",
                sender: "bob",
                content: "👍",
                threadId: "p-1",
                timestamp: new Date(2024, 5, 15, 10, 5, 0),
            });
            const late = createMockMessage({
                id: "m-late",
                content: "Morning standup notes",
                timestamp: new Date(2024, 5, 15, 9, 0, 0),
            });

            const stats = await service.ingestBatch([parent, reply, { ...parent }, late]);

            expect(stats.totalProcessed).toBe(4);
            expect(stats.newMessages).toBe(2);
            expect(stats.duplicates).toBe(1);
            expect(stats.updates).toBe(0);
            expect(stats.reactionUpdates).toBe(0);
            expect(stats.failed).toBe(1);
            expect(stats.errors).toEqual([
                { messageId: "m-late", error: new OutOfOrderMessageError("m-late", "engineering", late.timestamp, parent.timestamp).message },
            ]);
        });

        it("should embed replies after their parents are stored", async () => {
            const service = createService(new InMemoryMessageStore());
            const reply = createMockMessage({
                id: "r-1",
                sender: "bob",
                content: "👍",
                threadId: "p-1",
                timestamp: new Date(2024, 5, 15, 10, 5, 0),
            });

            await service.ingestBatch([reply, parent]);

            expect(embeddings.calls).toHaveLength(2);
            expect(embeddings.calls[0]).toMatch(/^Channel: #engineering \(software development\)\n/);
            expect(embeddings.calls[1]).toMatch(/^Thread context: alice: Should we deploy the API changes\?/);
        });

        it("should roll back failed writes and report them", async () => {
            const store = new FlakyMessageStore(1);
            const service = createService(store, 1);
            const other = createMockMessage({ id: "m-2", timestamp: new Date(2024, 5, 15, 11, 0, 0) });

            const stats = await service.ingestBatch([parent, other]);

            expect(stats.newMessages).toBe(1);
            expect(stats.failed).toBe(1);
            expect(stats.errors[0].messageId).toBe("p-1");
            expect(await dedupIndex.get(gate.keyFor(parent))).toBeNull();
            expect(await store.get("m-2")).not.toBeNull();
        });

        it("should accept a retry of a failed write after later messages in its scope were stored", async () => {
            const store = new FlakyMessageStore(1);
            const service = createService(store, 1);
            const later = createMockMessage({ id: "m-2", timestamp: new Date(2024, 5, 15, 11, 0, 0) });

            const stats = await service.ingestBatch([parent, later]);
            expect(stats.failed).toBe(1);

            const retried = await service.ingest(parent);

            expect(retried.result.kind).toBe("new");
            expect(await store.get("p-1")).not.toBeNull();
            expect(await dedupIndex.getWatermark("engineering")).toEqual(later.timestamp);
            expect(await dedupIndex.isRetryPending(gate.keyFor(parent))).toBe(false);
        });

        it("should keep an edit's version when the original capture in the same batch fails", async () => {
            const store = new FlakyMessageStore(1);
            const service = createService(store, 1);
            const edit = { ...parent, content: "Should we deploy the API changes tomorrow?" };

            const stats = await service.ingestBatch([parent, edit]);

            expect(stats.updates).toBe(1);
            expect(stats.failed).toBe(1);
            expect(stats.errors[0].messageId).toBe("p-1");
            expect((await dedupIndex.get(gate.keyFor(parent)))?.version).toBe(2);
            expect((await store.get("p-1"))?.metadata?.version).toBe(2);

            const again = await service.ingest({ ...edit });
            expect(again.result.kind).toBe("duplicate");
        });

        it("should unwind to the state before the batch when every capture of a message fails", async () => {
            const store = new FlakyMessageStore(2);
            const service = createService(store, 1);
            const edit = { ...parent, content: "Should we deploy the API changes tomorrow?" };

            const stats = await service.ingestBatch([parent, edit]);

            expect(stats.failed).toBe(2);
            expect(await dedupIndex.get(gate.keyFor(parent))).toBeNull();
            expect(await dedupIndex.getWatermark("engineering")).toBeNull();

            const retried = await service.ingest(edit);
            expect(retried.result.kind).toBe("new");
            expect((await store.get("p-1"))?.metadata?.version).toBe(1);
        });

        it("should apply reaction-only changes in a batch", async () => {
            const store = new InMemoryMessageStore();
            const service = createService(store);
            await service.ingest(parent);

            const stats = await service.ingestBatch([{ ...parent, metadata: { reactions: { "🎉": 1 } } }]);

            expect(stats.reactionUpdates).toBe(1);
            expect((await store.get("p-1"))?.metadata?.reactions).toEqual({ "🎉": 1 });
        });
    });
});
