import { beforeEach, describe, expect, it, vi } from "vitest";
import { ChatSift } from "@/ChatSift";
import { fixedClock } from "@/lib/clock";
import { ConfigService } from "@/services/ConfigService";
import { HashingEmbeddingProvider } from "@/services/embedding";
import { type ToolRegistry, createToolRegistry, listTools } from "@/tools/registry";

vi.mock("@/utils/logger", () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

const parentTime = new Date(2024, 5, 15, 10, 0, 0);
const replyTime = new Date(2024, 5, 15, 10, 3, 0);
const parentContent = "Should we deploy the API changes? Tests are passing.";

function parentInput(): Record<string, unknown> {
    return {
        id: "p-1",
        timestamp: parentTime.toISOString(),
        sender: "alice",
        content: parentContent,
        channel: "engineering",
    };
}

function replyInput(): Record<string, unknown> {
    return {
        id: "r-1",
        timestamp: replyTime.toISOString(),
        sender: "bob",
        content: "👍",
        channel: "engineering",
        threadId: "p-1",
        messageType: "reply",
    };
}

describe("createToolRegistry", () => {
    let registry: ToolRegistry;

    beforeEach(() => {
        const config = new ConfigService({}).parse({ ingestion: { retryBaseMs: 0 } });
        const chatsift = new ChatSift(config, {
            embeddingProvider: new HashingEmbeddingProvider(64),
            clock: fixedClock(new Date(2024, 5, 15, 12, 0, 0)),
        });
        registry = createToolRegistry(chatsift);
    });

    it("should list every tool once", () => {
        expect(listTools(registry).map((tool) => tool.name)).toEqual([
            "ingest_message",
            "search_messages",
            "get_thread_context",
            "get_contextual_meaning",
            "create_conversation_chunks",
            "get_conversation_stats",
        ]);
    });

    describe("ingest_message", () => {
        it("should report new messages and their meaning", async () => {
            expect(await registry.ingest_message.execute(parentInput())).toEqual({
                ok: true,
                data: { result: "new", id: "p-1", version: 1, contextualMeaning: null },
            });
            expect(await registry.ingest_message.execute(replyInput())).toEqual({
                ok: true,
                data: {
                    result: "new",
                    id: "r-1",
                    version: 1,
                    contextualMeaning: `approval confirmation in response to: "${parentContent}"`,
                },
            });
        });

        it("should report duplicates", async () => {
            await registry.ingest_message.execute(parentInput());
            const second = await registry.ingest_message.execute(parentInput());

            expect(second).toEqual({
                ok: true,
                data: { result: "duplicate", id: "p-1", version: 1, contextualMeaning: null },
            });
        });

        it("should classify malformed input as a validation error", async () => {
            const result = await registry.ingest_message.execute({ ...parentInput(), timestamp: "not a date" });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe("validation");
                expect(result.error.field).toBe("timestamp");
                expect(result.error.tool).toBe("ingest_message");
            }
        });
    });

    describe("search_messages", () => {
        beforeEach(async () => {
            await registry.ingest_message.execute(parentInput());
            await registry.ingest_message.execute(replyInput());
        });

        it("should rank keyword matches first", async () => {
            const result = await registry.search_messages.execute({ query: "deploy" });

            expect(result.ok).toBe(true);
            if (!result.ok) return;
            expect(result.data).toMatchObject({
                results: [
                    { message: { id: "p-1", timestamp: parentTime.toISOString() }, matchedKeywords: ["deploy"] },
                    { message: { id: "r-1", threadId: "p-1" }, matchedKeywords: [] },
                ],
            });
        });

        it("should return guidance when filters exclude everything", async () => {
            const result = await registry.search_messages.execute({ query: "deploy", channels: ["finance"] });

            expect(result).toEqual({
                ok: true,
                data: {
                    results: [],
                    guidance: [
                        "Try broader or alternative keywords than: deploy.",
                        "Remove the channel filter (#finance) to search every channel.",
                    ],
                },
            });
        });

        it("should apply since and until as a date range", async () => {
            const result = await registry.search_messages.execute({
                query: "deploy",
                since: Math.floor(replyTime.getTime() / 1000),
                until: replyTime.toISOString(),
            });

            expect(result).toMatchObject({ ok: true, data: { results: [{ message: { id: "r-1" } }] } });
        });

        it("should track turns in a session", async () => {
            await registry.search_messages.execute({ query: "deploy", sessionId: "s-1" });
            const result = await registry.search_messages.execute({ query: "api changes", sessionId: "s-1" });

            expect(result).toMatchObject({ ok: true, data: { sessionId: "s-1", turnNumber: 2 } });
        });

        it("should reject an empty query", async () => {
            const result = await registry.search_messages.execute({ query: "" });
            expect(result).toMatchObject({ ok: false, error: { kind: "validation", field: "query" } });
        });
    });

    describe("get_thread_context", () => {
        it("should return the parent and replies", async () => {
            await registry.ingest_message.execute(parentInput());
            await registry.ingest_message.execute(replyInput());

            const result = await registry.get_thread_context.execute({ threadId: "p-1" });

            expect(result).toMatchObject({
                ok: true,
                data: {
                    threadId: "p-1",
                    parentMessage: { id: "p-1", sender: "alice" },
                    recentMessages: [{ id: "r-1", content: "👍" }],
                    totalMessageCount: 2,
                },
            });
        });

        it("should return null for unknown threads", async () => {
            expect(await registry.get_thread_context.execute({ threadId: "missing" })).toEqual({ ok: true, data: null });
        });
    });

    describe("get_contextual_meaning", () => {
        it("should explain stored short messages", async () => {
            await registry.ingest_message.execute(parentInput());
            await registry.ingest_message.execute(replyInput());

            expect(await registry.get_contextual_meaning.execute({ messageId: "r-1" })).toEqual({
                ok: true,
                data: { messageId: "r-1", meaning: `approval confirmation in response to: "${parentContent}"` },
            });
        });

        it("should return null meaning for unknown messages", async () => {
            expect(await registry.get_contextual_meaning.execute({ messageId: "nope" })).toEqual({
                ok: true,
                data: { messageId: "nope", meaning: null },
            });
        });
    });

    describe("create_conversation_chunks", () => {
        it("should group messages inside the window", async () => {
            const result = await registry.create_conversation_chunks.execute({
                messages: [
                    { id: "c-1", timestamp: parentTime.toISOString(), sender: "alice", content: "Release build is green", channel: "releases" },
                    { id: "c-2", timestamp: replyTime.toISOString(), sender: "bob", content: "Release notes drafted", channel: "releases" },
                ],
                timeWindowSeconds: 600,
            });

            expect(result).toMatchObject({
                ok: true,
                data: {
                    chunks: [
                        {
                            topic: "release, build, green",
                            summary: "2 messages from 2 participants about release, build, green",
                            participants: ["alice", "bob"],
                            messageIds: ["c-1", "c-2"],
                            start: parentTime.toISOString(),
                            end: replyTime.toISOString(),
                        },
                    ],
                },
            });
        });

        it("should split when the window is exceeded", async () => {
            const result = await registry.create_conversation_chunks.execute({
                messages: [
                    { id: "c-1", timestamp: parentTime.toISOString(), sender: "alice", content: "Release build is green", channel: "releases" },
                    { id: "c-2", timestamp: replyTime.toISOString(), sender: "bob", content: "Release notes drafted", channel: "releases" },
                ],
                timeWindowSeconds: 60,
            });

            expect(result).toMatchObject({
                ok: true,
                data: { chunks: [{ messageIds: ["c-1"] }, { messageIds: ["c-2"] }] },
            });
        });
    });

    describe("get_conversation_stats", () => {
        beforeEach(async () => {
            await registry.ingest_message.execute(parentInput());
            await registry.ingest_message.execute(replyInput());
        });

        it("should summarize every stored message", async () => {
            expect(await registry.get_conversation_stats.execute({ top: 2 })).toEqual({
                ok: true,
                data: {
                    totalMessages: 2,
                    uniqueKeywords: 5,
                    dateRange: { earliest: parentTime.toISOString(), latest: replyTime.toISOString() },
                    topKeywords: [
                        { keyword: "api", count: 1 },
                        { keyword: "changes", count: 1 },
                    ],
                    topSenders: [
                        { sender: "alice", count: 1 },
                        { sender: "bob", count: 1 },
                    ],
                    topChannels: [{ channel: "engineering", count: 2 }],
                },
            });
        });

        it("should limit the summary to the requested time range", async () => {
            const result = await registry.get_conversation_stats.execute({
                since: new Date(2024, 5, 15, 10, 1, 0).toISOString(),
            });

            expect(result).toMatchObject({
                ok: true,
                data: { totalMessages: 1, uniqueKeywords: 0, topSenders: [{ sender: "bob", count: 1 }] },
            });
        });

        it("should reject a malformed date", async () => {
            const result = await registry.get_conversation_stats.execute({ until: "someday" });
            expect(result.ok).toBe(false);
        });
    });
});
