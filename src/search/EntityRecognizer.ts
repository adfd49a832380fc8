import { STOP_WORDS } from "./KeywordExtractor";
import { TEMPORAL_WORDS } from "./TemporalResolver";
import type { Entity, EntityKind } from "./types";

/**
 * Named-entity recognition is a pluggable capability. The parser only
 * depends on this interface.
 */
export interface EntityRecognizer {
    recognize(text: string): Entity[];
}

const ORGANIZATION_SUFFIXES = new Set(["inc", "corp", "llc", "labs", "ltd", "team", "co"]);
const PLACE_PREPOSITIONS = new Set(["in", "at", "near"]);
const WEEKDAYS = new Set([
    "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
]);

interface WordToken {
    word: string;
    index: number;
    sentenceStart: boolean;
}

function scanWords(text: string): WordToken[] {
    const tokens: WordToken[] = [];
    let sentenceStart = true;
    for (const match of text.matchAll(/[\p{L}][\p{L}\p{N}'&-]*|[.!?]/gu)) {
        const value = match[0];
        const index = match.index ?? 0;
        if (value === "." || value === "!" || value === "?") {
            sentenceStart = true;
            continue;
        }
        tokens.push({ word: value, index, sentenceStart });
        sentenceStart = false;
    }
    return tokens;
}

function isCandidate(token: WordToken, text: string): boolean {
    if (!/^\p{Lu}/u.test(token.word)) return false;
    const lower = token.word.toLowerCase();
    if (STOP_WORDS.has(lower) || TEMPORAL_WORDS.has(lower) || WEEKDAYS.has(lower)) return false;
    // #channel and @user handles are not entities
    const before = token.index > 0 ? text[token.index - 1] : "";
    return before !== "#" && before !== "@";
}

function isAdjacent(previous: WordToken, next: WordToken, text: string): boolean {
    return text.slice(previous.index + previous.word.length, next.index).trim() === "";
}

/**
 * Heuristic recognizer: runs of capitalised words that do not open a sentence.
 * Organisation suffixes mark organisations, a preceding in/at/near marks
 * places, anything else is taken to be a person.
 */
export class CapitalizedSpanRecognizer implements EntityRecognizer {
    recognize(text: string): Entity[] {
        const tokens = scanWords(text);
        const entities: Entity[] = [];
        const seen = new Set<string>();

        let i = 0;
        while (i < tokens.length) {
            const token = tokens[i];
            if (token.sentenceStart || !isCandidate(token, text)) {
                i++;
                continue;
            }

            const span: WordToken[] = [token];
            let j = i + 1;
            while (
                j < tokens.length &&
                !tokens[j].sentenceStart &&
                isAdjacent(tokens[j - 1], tokens[j], text) &&
                isCandidate(tokens[j], text)
            ) {
                span.push(tokens[j]);
                j++;
            }

            const spanText = span.map((t) => t.word).join(" ");
            const key = spanText.toLowerCase();
            if (!seen.has(key)) {
                seen.add(key);
                const previous = i > 0 ? tokens[i - 1].word.toLowerCase() : "";
                entities.push({ text: spanText, kind: classify(span, previous) });
            }
            i = j;
        }

        return entities;
    }
}

function classify(span: WordToken[], previousWord: string): EntityKind {
    const last = span[span.length - 1].word.toLowerCase().replace(/\.$/, "");
    if (ORGANIZATION_SUFFIXES.has(last)) return "organization";
    if (PLACE_PREPOSITIONS.has(previousWord)) return "place";
    return "person";
}
