/**
 * TemporalResolver - turns time phrases in a query into concrete ranges.
 *
 * Relative phrases are tried first, then absolute dates. All arithmetic is
 * relative to the supplied "now" in the local calendar.
 */

import {
    addHours,
    endOfDay,
    endOfMonth,
    isAfter,
    startOfDay,
    startOfMonth,
    startOfWeek,
    startOfYear,
    subDays,
    subMonths,
    subWeeks,
    subYears,
} from "date-fns";
import type { ResolvedTime, TemporalHint } from "./types";

export interface TemporalMatch {
    hint: TemporalHint;
    /** Exact substring of the lower-cased query the hint came from */
    matchedText: string;
}

const MONTHS: Record<string, number> = {
    january: 0, jan: 0,
    february: 1, feb: 1,
    march: 2, mar: 2,
    april: 3, apr: 3,
    may: 4,
    june: 5, jun: 5,
    july: 6, jul: 6,
    august: 7, aug: 7,
    september: 8, sept: 8, sep: 8,
    october: 9, oct: 9,
    november: 10, nov: 10,
    december: 11, dec: 11,
};

const MONTH_PATTERN = Object.keys(MONTHS)
    .sort((a, b) => b.length - a.length)
    .join("|");

/**
 * Words that only ever appear in time phrases. Used to stop "from yesterday"
 * being read as a sender.
 */
export const TEMPORAL_WORDS: ReadonlySet<string> = new Set([
    "today", "yesterday", "tonight", "morning", "afternoon", "evening",
    "last", "this", "past", "ago", "day", "days", "week", "weeks",
    "month", "months", "year", "years",
    ...Object.keys(MONTHS),
]);

type RelativeRule = {
    pattern: RegExp;
    resolve: (now: Date, match: RegExpMatchArray) => ResolvedTime;
};

function range(start: Date, end: Date): ResolvedTime {
    return { kind: "range", start, end };
}

function subUnit(now: Date, amount: number, unit: string): Date {
    if (unit.startsWith("week")) return subWeeks(now, amount);
    if (unit.startsWith("month")) return subMonths(now, amount);
    return subDays(now, amount);
}

const RELATIVE_RULES: RelativeRule[] = [
    {
        pattern: /\b(?:last|past) (\d+) (days?|weeks?|months?)\b/,
        resolve: (now, m) => range(subUnit(now, Number(m[1]), m[2]), now),
    },
    {
        pattern: /\b(\d+) (days?|weeks?|months?) ago\b/,
        resolve: (now, m) => ({ kind: "point", date: subUnit(now, Number(m[1]), m[2]) }),
    },
    {
        pattern: /\bthis morning\b/,
        resolve: (now) => range(startOfDay(now), addHours(startOfDay(now), 12)),
    },
    {
        pattern: /\bthis afternoon\b/,
        resolve: (now) => range(addHours(startOfDay(now), 12), addHours(startOfDay(now), 18)),
    },
    {
        pattern: /\b(?:tonight|this evening)\b/,
        resolve: (now) => range(addHours(startOfDay(now), 18), endOfDay(now)),
    },
    {
        pattern: /\byesterday\b/,
        resolve: (now) => range(startOfDay(subDays(now, 1)), startOfDay(now)),
    },
    {
        pattern: /\btoday\b/,
        resolve: (now) => range(startOfDay(now), endOfDay(now)),
    },
    {
        pattern: /\bthis week\b/,
        resolve: (now) => range(startOfWeek(now), now),
    },
    {
        pattern: /\blast week\b/,
        resolve: (now) => range(subWeeks(now, 1), now),
    },
    {
        pattern: /\bthis month\b/,
        resolve: (now) => range(startOfMonth(now), now),
    },
    {
        pattern: /\blast month\b/,
        resolve: (now) => range(subMonths(now, 1), now),
    },
    {
        pattern: /\bthis year\b/,
        resolve: (now) => range(startOfYear(now), now),
    },
    {
        pattern: /\blast year\b/,
        resolve: (now) => range(subYears(now, 1), now),
    },
];

function wholeDay(date: Date): ResolvedTime {
    return range(startOfDay(date), endOfDay(date));
}

/**
 * Build a local calendar date, rejecting overflow such as February 30.
 */
function calendarDate(year: number, month: number, day: number): Date | null {
    const date = new Date(year, month, day);
    if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
        return null;
    }
    return date;
}

function resolveAbsolute(text: string, now: Date): TemporalMatch | undefined {
    const iso = text.match(/\b(\d{4})-(\d{2})-(\d{2})\b/);
    if (iso) {
        const date = calendarDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
        if (date) {
            return {
                hint: { kind: "absolute", rawValue: iso[0], resolved: wholeDay(date) },
                matchedText: iso[0],
            };
        }
    }

    const monthYear = text.match(new RegExp(`\\b(${MONTH_PATTERN}) (\\d{4})\\b`));
    if (monthYear) {
        const month = MONTHS[monthYear[1]];
        const first = new Date(Number(monthYear[2]), month, 1);
        return {
            hint: {
                kind: "absolute",
                rawValue: monthYear[0],
                resolved: range(startOfMonth(first), endOfMonth(first)),
            },
            matchedText: monthYear[0],
        };
    }

    const monthDay = text.match(
        new RegExp(`\\b(${MONTH_PATTERN}) (\\d{1,2})(?:st|nd|rd|th)?\\b(?:,? (\\d{4})\\b)?`)
    );
    if (monthDay) {
        const month = MONTHS[monthDay[1]];
        const day = Number(monthDay[2]);
        const explicitYear = monthDay[3] ? Number(monthDay[3]) : undefined;
        let date = calendarDate(explicitYear ?? now.getFullYear(), month, day);
        if (date && explicitYear === undefined && isAfter(date, now)) {
            date = calendarDate(now.getFullYear() - 1, month, day);
        }
        if (date) {
            return {
                hint: { kind: "absolute", rawValue: monthDay[0], resolved: wholeDay(date) },
                matchedText: monthDay[0],
            };
        }
    }

    return undefined;
}

/**
 * Find the first time phrase in `text` (expected lower-cased).
 */
export function resolveTemporalHint(text: string, now: Date): TemporalMatch | undefined {
    const normalized = text.toLowerCase().replace(/\s+/g, " ");

    for (const rule of RELATIVE_RULES) {
        const match = normalized.match(rule.pattern);
        if (match) {
            return {
                hint: { kind: "relative", rawValue: match[0], resolved: rule.resolve(now, match) },
                matchedText: match[0],
            };
        }
    }

    return resolveAbsolute(normalized, now);
}

/**
 * Range form of a resolved time, widening a point by `toleranceMs` each way.
 */
export function toRange(resolved: ResolvedTime, toleranceMs: number): { start: Date; end: Date } {
    switch (resolved.kind) {
        case "range":
            return { start: resolved.start, end: resolved.end };
        case "point":
            return {
                start: new Date(resolved.date.getTime() - toleranceMs),
                end: new Date(resolved.date.getTime() + toleranceMs),
            };
    }
}
