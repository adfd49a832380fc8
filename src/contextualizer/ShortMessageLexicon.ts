import { z } from "zod";
import lexiconData from "./data/short-message-lexicon.json";

export const SIGNAL_MEANINGS = [
    "approval",
    "disapproval",
    "completion",
    "rejection",
    "urgency",
    "enthusiasm",
    "agreement",
    "amusement",
    "uncertainty",
    "encouragement",
    "gratitude",
    "celebration",
    "attention",
    "greeting",
    "acknowledgement",
    "affirmation",
    "negation",
    "inProgress",
    "timeEstimate",
    "information",
    "summary",
] as const;

export type SignalMeaning = (typeof SIGNAL_MEANINGS)[number];

const MeaningSchema = z.enum(SIGNAL_MEANINGS);

const ShortSignalSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("emoji"), token: z.string(), meaning: MeaningSchema }),
    z.object({
        kind: z.literal("abbreviation"),
        token: z.string(),
        expansion: z.string(),
        meaning: MeaningSchema,
    }),
    z.object({ kind: z.literal("acknowledgement"), token: z.string(), meaning: MeaningSchema }),
]);

export type ShortSignal = z.infer<typeof ShortSignalSchema>;

export function describeMeaning(meaning: SignalMeaning): string {
    switch (meaning) {
        case "approval":
            return "approval confirmation";
        case "disapproval":
            return "disapproval or disagreement";
        case "completion":
            return "confirmation that the task is done";
        case "rejection":
            return "rejection or failure";
        case "urgency":
            return "urgent alert needing attention";
        case "enthusiasm":
            return "enthusiasm about the result";
        case "agreement":
            return "strong agreement";
        case "amusement":
            return "amusement";
        case "uncertainty":
            return "uncertainty, still thinking it over";
        case "encouragement":
            return "encouragement and support";
        case "gratitude":
            return "gratitude";
        case "celebration":
            return "celebration of a success";
        case "attention":
            return "acknowledgement that it is being looked at";
        case "greeting":
            return "greeting";
        case "acknowledgement":
            return "acknowledgement";
        case "affirmation":
            return "affirmative answer";
        case "negation":
            return "negative answer";
        case "inProgress":
            return "work in progress";
        case "timeEstimate":
            return "question or note about timing";
        case "information":
            return "information shared for awareness";
        case "summary":
            return "short summary of a longer discussion";
    }
}

export function describeSignal(signal: ShortSignal): string {
    switch (signal.kind) {
        case "emoji":
        case "acknowledgement":
            return describeMeaning(signal.meaning);
        case "abbreviation":
            return `${signal.expansion} (${describeMeaning(signal.meaning)})`;
    }
}

const EMOJI_ONLY = /^(?:\p{Extended_Pictographic}|\p{Emoji_Modifier}|\u{FE0F}|\u{200D}|\s)+$/u;

/**
 * Lookup key: lower-cased, skin tones and variation selectors removed,
 * trailing "." and "!" dropped.
 */
export function normalizeToken(text: string): string {
    return text
        .trim()
        .toLowerCase()
        .replace(/[\u{1F3FB}-\u{1F3FF}\u{FE0F}]/gu, "")
        .replace(/[.!]+$/, "")
        .trim();
}

export function isEmojiOnly(text: string): boolean {
    const trimmed = text.trim();
    return trimmed.length > 0 && EMOJI_ONLY.test(trimmed);
}

export class ShortMessageLexicon {
    private readonly entries = new Map<string, ShortSignal>();

    constructor(signals: readonly ShortSignal[]) {
        for (const signal of signals) {
            this.entries.set(normalizeToken(signal.token), signal);
        }
    }

    static fromJson(data: unknown): ShortMessageLexicon {
        return new ShortMessageLexicon(z.array(ShortSignalSchema).parse(data));
    }

    /**
     * Exact match first; an emoji-only message falls back to its first known glyph.
     */
    lookup(text: string): ShortSignal | null {
        const key = normalizeToken(text);
        const exact = this.entries.get(key);
        if (exact) return exact;

        if (isEmojiOnly(key)) {
            for (const glyph of key.replace(/[\s\u{200D}]/gu, "")) {
                const signal = this.entries.get(glyph);
                if (signal) return signal;
            }
        }
        return null;
    }

    get size(): number {
        return this.entries.size;
    }
}

let defaultLexicon: ShortMessageLexicon | undefined;

export function getDefaultLexicon(): ShortMessageLexicon {
    if (!defaultLexicon) {
        defaultLexicon = ShortMessageLexicon.fromJson(lexiconData);
    }
    return defaultLexicon;
}
