/**
 * QueryParser - turns free-text queries into structured ParsedQuery values.
 *
 * Handles:
 * - Intent detection (first trigger word in text order wins, default "search")
 * - Channel filters (#channel, "in <name> channel")
 * - User filters (@user, "from <user>", "by <user>")
 * - Temporal hints (relative phrases first, then absolute dates)
 * - Keyword extraction with stop-words and claimed tokens removed
 * - Entities via an injected EntityRecognizer
 *
 * Parsing never throws: unrecognised input degrades to intent "search" with
 * whatever keywords remain.
 */

import { type Clock, systemClock } from "@/lib/clock";
import { CapitalizedSpanRecognizer, type EntityRecognizer } from "./EntityRecognizer";
import { STOP_WORDS, extractKeywords, tokenize } from "./KeywordExtractor";
import { TEMPORAL_WORDS, resolveTemporalHint } from "./TemporalResolver";
import type { ParsedQuery, QueryIntent } from "./types";

const INTENT_TRIGGERS: Record<QueryIntent, readonly string[]> = {
    search: ["find", "search", "look", "get", "where", "locate"],
    show: ["show", "display", "present", "reveal"],
    list: ["list", "enumerate"],
    analyze: ["analyze", "analyse", "review", "examine", "study"],
    summarize: ["summarize", "summarise", "summary", "recap", "tldr"],
    compare: ["compare", "versus", "vs"],
    filter: ["filter", "narrow"],
};

const INTENTS: readonly QueryIntent[] = [
    "search",
    "show",
    "list",
    "analyze",
    "summarize",
    "compare",
    "filter",
];

const TRIGGER_TO_INTENT = new Map<string, QueryIntent>(
    INTENTS.flatMap((intent) => INTENT_TRIGGERS[intent].map((word): [string, QueryIntent] => [word, intent]))
);

export interface QueryParserOptions {
    clock?: Clock;
    entityRecognizer?: EntityRecognizer;
}

function uniquePush(target: string[], value: string): void {
    const normalized = value.toLowerCase().replace(/[.,;:!?]+$/, "");
    if (normalized.length > 0 && !target.includes(normalized)) {
        target.push(normalized);
    }
}

function isPlausibleUser(candidate: string): boolean {
    const lower = candidate.toLowerCase();
    return (
        !STOP_WORDS.has(lower) &&
        !TEMPORAL_WORDS.has(lower) &&
        !TRIGGER_TO_INTENT.has(lower) &&
        !/^\d+$/.test(lower)
    );
}

export class QueryParser {
    private readonly clock: Clock;
    private readonly entityRecognizer: EntityRecognizer;

    constructor(options: QueryParserOptions = {}) {
        this.clock = options.clock ?? systemClock;
        this.entityRecognizer = options.entityRecognizer ?? new CapitalizedSpanRecognizer();
    }

    parse(text: string): ParsedQuery {
        const originalText = text;
        const lower = text.toLowerCase();
        const claimed = new Set<string>();

        const temporal = resolveTemporalHint(lower, this.clock.now());
        if (temporal) {
            for (const token of tokenize(temporal.matchedText)) claimed.add(token);
        }

        const channels: string[] = [];
        for (const match of lower.matchAll(/#([\p{L}\p{N}_-]+)/gu)) {
            uniquePush(channels, match[1]);
        }
        for (const match of lower.matchAll(/\bin (?:the )?#?([\p{L}\p{N}_-]+) channel\b/gu)) {
            uniquePush(channels, match[1]);
            claimed.add("channel");
        }

        const users: string[] = [];
        for (const match of lower.matchAll(/(?:^|[^\p{L}\p{N}_])@([\p{L}\p{N}._-]+)/gu)) {
            uniquePush(users, match[1]);
        }
        for (const match of lower.matchAll(/\b(?:from|by) @?([\p{L}\p{N}._-]+)/gu)) {
            if (isPlausibleUser(match[1])) {
                uniquePush(users, match[1]);
            }
        }

        for (const name of [...channels, ...users]) {
            for (const token of tokenize(name)) claimed.add(token);
        }

        const tokens = tokenize(lower);
        let intent: QueryIntent = "search";
        for (const token of tokens) {
            const triggered = TRIGGER_TO_INTENT.get(token);
            if (triggered) {
                intent = triggered;
                break;
            }
        }

        const exclude = new Set<string>([...claimed, ...TRIGGER_TO_INTENT.keys()]);
        const keywords = extractKeywords(lower, exclude);

        const handles = new Set([...channels, ...users]);
        const entities = this.entityRecognizer
            .recognize(originalText)
            .filter((entity) => !handles.has(entity.text.toLowerCase()));

        return Object.freeze({
            originalText,
            intent,
            keywords: Object.freeze(keywords),
            entities: Object.freeze(entities.map((entity) => Object.freeze(entity))),
            channels: Object.freeze(channels),
            users: Object.freeze(users),
            ...(temporal ? { temporalHint: temporal.hint } : {}),
        });
    }
}
