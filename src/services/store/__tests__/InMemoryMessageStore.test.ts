import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StoreUnavailableError } from "@/lib/errors";
import { InMemoryDedupIndex } from "@/services/store/InMemoryDedupIndex";
import { InMemoryMessageStore } from "@/services/store/InMemoryMessageStore";
import { cleanupTempDir, createMockMessage, createStoredMessage, createTempDir } from "@/test-utils";

vi.mock("@/utils/logger", () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

describe("InMemoryMessageStore", () => {
    let store: InMemoryMessageStore;

    beforeEach(async () => {
        store = new InMemoryMessageStore();
        await store.upsert(
            createStoredMessage(
                createMockMessage({ id: "a", content: "database migration", timestamp: new Date(2024, 5, 15, 9) }),
                [1, 0]
            )
        );
        await store.upsert(
            createStoredMessage(
                createMockMessage({ id: "b", content: "migrations are slow", timestamp: new Date(2024, 5, 15, 11) }),
                [0, 1]
            )
        );
    });

    it("should order vector matches by distance", async () => {
        const matches = await store.queryByVector(new Float32Array([1, 0.1]), 2);
        expect(matches.map((match) => match.id)).toEqual(["a", "b"]);
        expect(await store.queryByVector(new Float32Array([1, 0]), 1)).toHaveLength(1);
    });

    it("should rank only filtered messages when a vector query carries a filter", async () => {
        const byTime = await store.queryByVector(new Float32Array([1, 0]), 5, { start: new Date(2024, 5, 15, 10) });
        expect(byTime.map((match) => match.id)).toEqual(["b"]);

        const byChannel = await store.queryByVector(new Float32Array([1, 0]), 5, { channels: ["random"] });
        expect(byChannel).toEqual([]);
    });

    it("should match keywords exactly or by containment", async () => {
        expect((await store.queryByKeywords(["migration"])).sort()).toEqual(["a", "b"]);
        expect(await store.queryByKeywords(["database"])).toEqual(["a"]);
        expect(await store.queryByKeywords(["billing"])).toEqual([]);
    });

    it("should query time ranges inclusively", async () => {
        expect(await store.queryByTimeRange(new Date(2024, 5, 15, 9), new Date(2024, 5, 15, 10))).toEqual(["a"]);
        expect(await store.queryByTimeRange(new Date(2024, 5, 15, 9), new Date(2024, 5, 15, 11))).toEqual(["a", "b"]);
    });

    it("should re-index keywords on upsert", async () => {
        await store.upsert(createStoredMessage(createMockMessage({ id: "a", content: "lunch order" }), [1, 0]));
        expect(await store.queryByKeywords(["database"])).toEqual([]);
        expect(await store.queryByKeywords(["lunch"])).toEqual(["a"]);
        expect(await store.count()).toBe(2);
    });

    it("should update reactions of known messages only", async () => {
        expect(await store.updateReactions("a", { "👍": 2 })).toBe(true);
        expect((await store.get("a"))?.metadata?.reactions).toEqual({ "👍": 2 });
        expect(await store.updateReactions("missing", { "👍": 1 })).toBe(false);
    });

    it("should list a thread's parent and replies oldest first", async () => {
        await store.upsert(
            createStoredMessage(
                createMockMessage({ id: "c", threadId: "a", content: "agreed", timestamp: new Date(2024, 5, 15, 12) }),
                [1, 0]
            )
        );
        expect((await store.getThreadMessages("a")).map((message) => message.id)).toEqual(["a", "c"]);
    });
});

describe("snapshots", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await createTempDir();
    });

    afterEach(async () => {
        await cleanupTempDir(dir);
    });

    it("should round-trip the message store through its snapshot file", async () => {
        const snapshotPath = path.join(dir, "data", "messages.json");
        const store = new InMemoryMessageStore({ snapshotPath });
        const message = createMockMessage({
            id: "a",
            content: "database migration",
            threadId: "t-1",
            timestamp: new Date("2024-06-15T10:00:00.000Z"),
            metadata: { reactions: { "👍": 1 }, version: 2 },
        });
        await store.upsert(createStoredMessage(message, [0.5, -0.25]));
        await store.flush();

        const reloaded = new InMemoryMessageStore({ snapshotPath });
        await reloaded.load();
        const record = await reloaded.getRecord("a");

        expect(record?.message).toEqual(message);
        expect(Array.from(record?.embedding ?? [])).toEqual([0.5, -0.25]);
        expect(await reloaded.queryByKeywords(["database"])).toEqual(["a"]);
    });

    it("should start empty when no snapshot exists", async () => {
        const store = new InMemoryMessageStore({ snapshotPath: path.join(dir, "missing.json") });
        await store.load();
        expect(await store.count()).toBe(0);
    });

    it("should report unreadable snapshots as store failures", async () => {
        const snapshotPath = path.join(dir, "broken.json");
        await fs.writeFile(snapshotPath, "{ not json");
        await expect(new InMemoryMessageStore({ snapshotPath }).load()).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it("should report failed writes as store failures", async () => {
        const snapshotPath = path.join(dir, "occupied");
        await fs.mkdir(snapshotPath);
        await fs.writeFile(path.join(snapshotPath, "keep.txt"), "x");

        const store = new InMemoryMessageStore({ snapshotPath });
        await store.upsert(createStoredMessage(createMockMessage({ id: "a" }), [1, 0]));
        await expect(store.flush()).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it("should round-trip dedup records, watermarks and pending retries", async () => {
        const snapshotPath = path.join(dir, "dedup-index.json");
        const index = new InMemoryDedupIndex({ snapshotPath });
        const record = {
            dedupKey: "engineering:m-1",
            messageId: "m-1",
            contentHash: "abc",
            version: 2,
            lastReactions: { "🎉": 1 },
            editedAt: new Date("2024-06-15T11:00:00.000Z"),
            timestamp: new Date("2024-06-15T10:00:00.000Z"),
        };
        await index.put(record);
        await index.setWatermark("engineering", new Date("2024-06-15T10:00:00.000Z"));
        await index.setWatermark("random", new Date("2024-06-15T09:00:00.000Z"));
        await index.setWatermark("random", null);
        await index.setRetryPending("engineering:m-0", true);
        await index.flush();

        const reloaded = new InMemoryDedupIndex({ snapshotPath });
        await reloaded.load();
        expect(await reloaded.get("engineering:m-1")).toEqual(record);
        expect(await reloaded.getWatermark("engineering")).toEqual(new Date("2024-06-15T10:00:00.000Z"));
        expect(await reloaded.getWatermark("random")).toBeNull();
        expect(await reloaded.isRetryPending("engineering:m-0")).toBe(true);
        expect(await reloaded.size()).toBe(1);
    });

    it("should hand out copies of dedup records", async () => {
        const index = new InMemoryDedupIndex();
        await index.put({
            dedupKey: "k",
            messageId: "m",
            contentHash: "h",
            version: 1,
            lastReactions: {},
            timestamp: new Date(),
        });
        const copy = await index.get("k");
        if (copy) copy.lastReactions["👍"] = 5;
        expect((await index.get("k"))?.lastReactions).toEqual({});
    });
});
