import { ZodError } from "zod";
import { ChatSiftError, InvalidMessageError } from "./errors";

/**
 * Shape returned to tool callers when an operation fails
 */
export interface ToolError {
    kind: "validation" | "execution" | "system";
    message: string;
    field?: string;
    tool?: string;
}

/**
 * Error formatter that renders any thrown value as a single line
 */
export function formatAnyError(error: unknown): string {
    if (error == null) {
        return "Unknown error";
    }

    if (typeof error === "string") {
        return error;
    }

    if (error instanceof ZodError) {
        return error.issues
            .map((issue) =>
                issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
            )
            .join("; ");
    }

    if (error instanceof Error) {
        return error.message;
    }

    if (typeof error === "object") {
        if (isToolError(error)) {
            return formatToolError(error);
        }

        if ("message" in error && typeof error.message === "string") {
            return error.message;
        }

        const parts: string[] = [];
        if ("code" in error) parts.push(`code: ${String(error.code)}`);
        if ("statusCode" in error) parts.push(`statusCode: ${String(error.statusCode)}`);
        if ("errno" in error) parts.push(`errno: ${String(error.errno)}`);
        if ("syscall" in error) parts.push(`syscall: ${String(error.syscall)}`);

        if (parts.length > 0) {
            return parts.join(", ");
        }

        try {
            const str = JSON.stringify(error);
            // Don't return huge JSON strings
            if (str.length > 200) {
                return "[Complex Error Object]";
            }
            return str;
        } catch {
            return "[Complex Error Object]";
        }
    }

    return String(error);
}

function isToolError(value: object): value is ToolError {
    if (!("kind" in value) || !("message" in value)) return false;
    const { kind, message } = value;
    return (
        typeof message === "string" &&
        (kind === "validation" || kind === "execution" || kind === "system")
    );
}

/**
 * Format ToolError objects into human-readable strings
 */
export function formatToolError(error: ToolError): string {
    switch (error.kind) {
        case "validation":
            if (error.field === "" && error.message === "Required") {
                return "Validation error: Missing required parameter";
            }
            return error.field
                ? `Validation error in ${error.field}: ${error.message}`
                : `Validation error: ${error.message}`;
        case "execution":
            return error.tool
                ? `Execution error in ${error.tool}: ${error.message}`
                : `Execution error: ${error.message}`;
        case "system":
            return `System error: ${error.message}`;
    }
}

/**
 * Classify a thrown value for a tool response
 */
export function toToolError(error: unknown, tool?: string): ToolError {
    if (error instanceof ZodError || error instanceof InvalidMessageError) {
        const field =
            error instanceof ZodError
                ? error.issues[0]?.path.join(".")
                : error.fields.join(", ") || undefined;
        return { kind: "validation", message: formatAnyError(error), field, tool };
    }
    if (error instanceof ChatSiftError) {
        return { kind: "execution", message: formatAnyError(error), tool };
    }
    return { kind: "system", message: formatAnyError(error), tool };
}
