import { describe, expect, it } from "vitest";
import { z } from "zod";
import { type ToolError, formatAnyError, formatToolError, toToolError } from "@/lib/error-formatter";
import { InvalidMessageError, QueryTimeoutError, StoreUnavailableError } from "@/lib/errors";

describe("Error Formatter", () => {
    describe("formatAnyError", () => {
        it("should handle null and undefined", () => {
            expect(formatAnyError(null)).toBe("Unknown error");
            expect(formatAnyError(undefined)).toBe("Unknown error");
        });

        it("should handle string errors", () => {
            expect(formatAnyError("Simple error message")).toBe("Simple error message");
        });

        it("should handle Error instances", () => {
            expect(formatAnyError(new StoreUnavailableError("put"))).toBe("Store unavailable during put");
        });

        it("should join zod issues with their paths", () => {
            const result = z.object({ sender: z.string(), limit: z.number() }).safeParse({ limit: "ten" });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(formatAnyError(result.error)).toBe(
                    "sender: Required; limit: Expected number, received string"
                );
            }
        });

        it("should handle ToolError objects", () => {
            const toolError: ToolError = {
                kind: "validation",
                field: "query",
                message: "Query is required",
                tool: "search_messages",
            };
            expect(formatAnyError(toolError)).toBe("Validation error in query: Query is required");
        });

        it("should handle objects with message property", () => {
            expect(formatAnyError({ message: "Custom error message" })).toBe("Custom error message");
        });

        it("should list system error properties", () => {
            expect(formatAnyError({ code: "ENOENT", errno: -2, syscall: "open" })).toBe(
                "code: ENOENT, errno: -2, syscall: open"
            );
        });

        it("should stringify small objects and cap large ones", () => {
            expect(formatAnyError({ foo: "bar", baz: 123 })).toBe('{"foo":"bar","baz":123}');
            expect(formatAnyError({ data: "x".repeat(300) })).toBe("[Complex Error Object]");
        });
    });

    describe("formatToolError", () => {
        it("should format each kind", () => {
            expect(formatToolError({ kind: "validation", message: "bad" })).toBe("Validation error: bad");
            expect(formatToolError({ kind: "execution", message: "boom", tool: "ingest_message" })).toBe(
                "Execution error in ingest_message: boom"
            );
            expect(formatToolError({ kind: "execution", message: "boom" })).toBe("Execution error: boom");
            expect(formatToolError({ kind: "system", message: "disk full" })).toBe("System error: disk full");
        });

        it("should report a missing required parameter", () => {
            expect(formatToolError({ kind: "validation", field: "", message: "Required" })).toBe(
                "Validation error: Missing required parameter"
            );
        });
    });

    describe("toToolError", () => {
        it("should classify invalid messages as validation errors", () => {
            const error = toToolError(new InvalidMessageError("Invalid message: sender", ["sender"]), "ingest_message");
            expect(error).toEqual({
                kind: "validation",
                message: "Invalid message: sender",
                field: "sender",
                tool: "ingest_message",
            });
        });

        it("should classify engine errors as execution errors", () => {
            const error = toToolError(new QueryTimeoutError("embed query", 50));
            expect(error.kind).toBe("execution");
            expect(error.message).toBe("embed query timed out after 50ms");
        });

        it("should classify anything else as a system error", () => {
            expect(toToolError(new Error("unexpected")).kind).toBe("system");
        });
    });
});
