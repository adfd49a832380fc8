import type { StoredMessage } from "@/services/store/types";

export interface StatsTimeRange {
    start?: Date;
    end?: Date;
}

export interface ConversationStats {
    totalMessages: number;
    uniqueKeywords: number;
    /** null when no message falls in the range */
    dateRange: { earliest: Date; latest: Date } | null;
    topKeywords: Array<{ keyword: string; count: number }>;
    topSenders: Array<{ sender: string; count: number }>;
    topChannels: Array<{ channel: string; count: number }>;
}

function inRange(record: StoredMessage, range: StatsTimeRange): boolean {
    const ts = record.message.timestamp.getTime();
    if (range.start && ts < range.start.getTime()) return false;
    if (range.end && ts > range.end.getTime()) return false;
    return true;
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Highest count first, then alphabetical so equal counts list the same way every time
function ranked(counts: Map<string, number>, top: number): Array<[string, number]> {
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, top);
}

/**
 * Aggregate counts over stored messages. A keyword counts once per message
 * that contains it.
 */
export function computeConversationStats(
    records: Iterable<StoredMessage>,
    range: StatsTimeRange = {},
    top = 10
): ConversationStats {
    const keywords = new Map<string, number>();
    const senders = new Map<string, number>();
    const channels = new Map<string, number>();
    let totalMessages = 0;
    let earliest: Date | null = null;
    let latest: Date | null = null;

    for (const record of records) {
        if (!inRange(record, range)) continue;
        const { message } = record;
        totalMessages++;
        for (const keyword of record.keywords) increment(keywords, keyword);
        increment(senders, message.sender);
        increment(channels, message.channel);
        if (!earliest || message.timestamp < earliest) earliest = message.timestamp;
        if (!latest || message.timestamp > latest) latest = message.timestamp;
    }

    return {
        totalMessages,
        uniqueKeywords: keywords.size,
        dateRange: earliest && latest ? { earliest, latest } : null,
        topKeywords: ranked(keywords, top).map(([keyword, count]) => ({ keyword, count })),
        topSenders: ranked(senders, top).map(([sender, count]) => ({ sender, count })),
        topChannels: ranked(channels, top).map(([channel, count]) => ({ channel, count })),
    };
}
