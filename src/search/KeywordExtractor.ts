import stopWordList from "./data/stop-words.json";

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Lower-case word tokens. `#`, `@` and punctuation split tokens; apostrophes,
 * hyphens and dots inside a word are kept ("don't", "v1.2", "follow-up").
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}'._-]+/u)
        .map((token) => token.replace(/^['._-]+|['._-]+$/g, ""))
        .filter((token) => token.length > 0);
}

export function isContentWord(token: string): boolean {
    return token.length >= 2 && !STOP_WORDS.has(token);
}

/**
 * Content words in first-seen order, without repeats.
 */
export function extractKeywords(text: string, exclude: ReadonlySet<string> = new Set()): string[] {
    const seen = new Set<string>();
    const keywords: string[] = [];
    for (const token of tokenize(text)) {
        if (!isContentWord(token) || exclude.has(token) || seen.has(token)) continue;
        seen.add(token);
        keywords.push(token);
    }
    return keywords;
}

/**
 * Content-word counts across texts. Map iteration order is first-seen order.
 */
export function keywordFrequencies(texts: Iterable<string>): Map<string, number> {
    const counts = new Map<string, number>();
    for (const text of texts) {
        for (const token of tokenize(text)) {
            if (!isContentWord(token)) continue;
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }
    }
    return counts;
}

/**
 * Most frequent keywords; ties keep first-seen order.
 */
export function topKeywords(texts: Iterable<string>, count: number): string[] {
    const entries = [...keywordFrequencies(texts).entries()];
    // Array.prototype.sort is stable, so equal counts stay in first-seen order
    entries.sort((a, b) => b[1] - a[1]);
    return entries.slice(0, count).map(([word]) => word);
}
