import { beforeEach, describe, expect, it, vi } from "vitest";
import { QueryTimeoutError } from "@/lib/errors";
import { fixedClock } from "@/lib/clock";
import { HybridSearchEngine } from "@/search/HybridSearchEngine";
import { QueryParser } from "@/search/QueryParser";
import type { SearchResponse } from "@/search/types";
import { InMemoryMessageStore } from "@/services/store/InMemoryMessageStore";
import { StubEmbeddingProvider, createMockMessage, createStoredMessage } from "@/test-utils";

vi.mock("@/utils/logger", () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

const now = new Date(2024, 5, 15, 12, 0, 0);
const parser = new QueryParser({ clock: fixedClock(now) });

function ids(response: SearchResponse): string[] {
    return response.kind === "results" ? response.results.map((result) => result.message.id) : [];
}

describe("HybridSearchEngine", () => {
    let store: InMemoryMessageStore;
    let engine: HybridSearchEngine;

    beforeEach(async () => {
        store = new InMemoryMessageStore();
        engine = new HybridSearchEngine(store, new StubEmbeddingProvider());

        await store.upsert(
            createStoredMessage(
                createMockMessage({
                    id: "recent",
                    content: "deployment failed on staging",
                    channel: "engineering",
                    sender: "alice",
                    timestamp: new Date(2024, 5, 14, 10, 0, 0),
                }),
                [1, 0]
            )
        );
        await store.upsert(
            createStoredMessage(
                createMockMessage({
                    id: "old",
                    content: "deployment went fine",
                    channel: "ops",
                    sender: "bob",
                    timestamp: new Date(2024, 5, 7, 12, 0, 0),
                }),
                [1, 0]
            )
        );
        await store.upsert(
            createStoredMessage(
                createMockMessage({
                    id: "offtopic",
                    content: "lunch plans",
                    channel: "random",
                    sender: "carol",
                    timestamp: new Date(2024, 5, 14, 11, 0, 0),
                }),
                [0, 1]
            )
        );
    });

    it("should rank by the weighted combination of scores", async () => {
        const response = await engine.search(parser.parse("deployment yesterday"), { limit: 10 });

        expect(response.kind).toBe("results");
        if (response.kind !== "results") return;
        expect(response.results.map((r) => r.message.id)).toEqual(["recent", "old", "offtopic"]);

        const [recent, old, offtopic] = response.results;
        expect(recent.combinedScore).toBeCloseTo(1);
        expect(recent.matchedKeywords).toEqual(["deployment"]);
        expect(old.temporalScore).toBeCloseTo(Math.pow(0.5, 6.5), 6);
        expect(old.combinedScore).toBeCloseTo(0.5 + 0.3 + 0.2 * Math.pow(0.5, 6.5), 6);
        expect(offtopic.semanticScore).toBeCloseTo(0);
        expect(offtopic.combinedScore).toBeCloseTo(0.2);
    });

    it("should keep every score within [0, 1]", async () => {
        const response = await engine.search(parser.parse("deployment yesterday"), { limit: 10 });
        if (response.kind !== "results") throw new Error("expected results");
        for (const result of response.results) {
            for (const score of [result.semanticScore, result.keywordScore, result.temporalScore, result.combinedScore]) {
                expect(score).toBeGreaterThanOrEqual(0);
                expect(score).toBeLessThanOrEqual(1);
            }
        }
    });

    it("should respect the limit", async () => {
        expect(ids(await engine.search(parser.parse("deployment yesterday"), { limit: 2 }))).toEqual(["recent", "old"]);
    });

    it("should break ties by newest first", async () => {
        const response = await engine.search(parser.parse("deployment"), { limit: 2 });
        expect(ids(response)).toEqual(["recent", "old"]);
        if (response.kind === "results") {
            expect(response.results[0].combinedScore).toBe(response.results[1].combinedScore);
        }
    });

    it("should apply channel filters case-insensitively", async () => {
        const response = await engine.search(parser.parse("deployment yesterday"), {
            limit: 10,
            filters: { channels: ["Engineering"] },
        });
        expect(ids(response)).toEqual(["recent"]);
    });

    it("should filter by sender from the query", async () => {
        expect(ids(await engine.search(parser.parse("deployment from bob"), { limit: 10 }))).toEqual(["old"]);
    });

    it("should apply an explicit date range", async () => {
        const response = await engine.search(parser.parse("deployment"), {
            limit: 10,
            filters: { dateRange: { start: new Date(2024, 5, 10) } },
        });
        expect(ids(response)).toEqual(["recent", "offtopic"]);
    });

    it("should find filtered messages when nearer unfiltered ones fill the candidate pool", async () => {
        const crowded = new InMemoryMessageStore();
        for (let i = 0; i < 60; i++) {
            await crowded.upsert(
                createStoredMessage(
                    createMockMessage({ id: `general-${i}`, content: "lunch plans for friday", channel: "general" }),
                    [1, 0]
                )
            );
        }
        await crowded.upsert(
            createStoredMessage(
                createMockMessage({ id: "hike", content: "weekend hike at the lake", channel: "random" }),
                [0, 1]
            )
        );
        const filtered = new HybridSearchEngine(crowded, new StubEmbeddingProvider(), { candidatePoolSize: 50 });

        const response = await filtered.search(parser.parse("lunch plans"), {
            limit: 5,
            filters: { channels: ["random"] },
        });

        expect(ids(response)).toEqual(["hike"]);
    });

    it("should drop results under the minimum score", async () => {
        const response = await engine.search(parser.parse("deployment yesterday"), { limit: 10, minScore: 0.5 });
        expect(ids(response)).toEqual(["recent", "old"]);
    });

    it("should explain an empty store", async () => {
        const empty = new HybridSearchEngine(new InMemoryMessageStore(), new StubEmbeddingProvider());
        expect(await empty.search(parser.parse("deployment"), { limit: 5 })).toEqual({
            kind: "empty",
            guidance: ["No messages have been ingested yet. Ingest messages before searching."],
        });
    });

    it("should suggest how to widen a search that matched nothing", async () => {
        expect(await engine.search(parser.parse("deployment in #finance"), { limit: 5 })).toEqual({
            kind: "empty",
            guidance: [
                "Try broader or alternative keywords than: deployment.",
                "Remove the channel filter (#finance) to search every channel.",
            ],
        });
    });

    it("should fail with QueryTimeoutError when the query embedding is too slow", async () => {
        const slow = new StubEmbeddingProvider();
        vi.spyOn(slow, "embed").mockImplementation(() => new Promise<Float32Array>(() => {}));
        const timed = new HybridSearchEngine(store, slow, { queryTimeoutMs: 10 });

        await expect(timed.search(parser.parse("deployment"), { limit: 5 })).rejects.toBeInstanceOf(QueryTimeoutError);
    });
});
