/**
 * Date input parsing for tool and CLI arguments
 */

import { formatDistanceStrict } from "date-fns";

/**
 * Parse a date argument.
 * Accepts:
 * - Unix timestamp in seconds (number or numeric string)
 * - ISO 8601 date strings (e.g., "2024-06-15T10:00:00Z")
 * - Date-only strings (e.g., "2024-06-15")
 *
 * @throws Error if the date cannot be parsed
 */
export function parseDateArgument(value: string | number): Date {
    if (typeof value === "number") {
        return new Date(value * 1000);
    }

    const numericValue = Number(value);
    if (!Number.isNaN(numericValue) && value.trim() === String(numericValue)) {
        return new Date(numericValue * 1000);
    }

    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
        throw new Error(`Invalid date format: "${value}". Expected Unix timestamp or ISO 8601 date.`);
    }
    return date;
}

/**
 * "3 hours ago" relative to `now`
 */
export function formatTimeAgo(date: Date, now: Date = new Date()): string {
    return `${formatDistanceStrict(date, now)} ago`;
}
