/**
 * Score components for hybrid ranking. Every score is in [0, 1].
 */

import { clamp01, cosineDistance } from "@/lib/vector";
import type { Message } from "@/messages/types";
import { toRange } from "./TemporalResolver";
import type { RankingWeights, TemporalHint } from "./types";

/**
 * Default ranking policy: meaning first, then wording, then recency fit.
 */
export const DEFAULT_RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
    semantic: 0.5,
    keyword: 0.3,
    temporal: 0.2,
});

export interface TemporalScoringOptions {
    halfLifeMs: number;
    /** Half-width applied around point hints */
    pointToleranceMs: number;
}

export const DEFAULT_TEMPORAL_SCORING: Readonly<TemporalScoringOptions> = Object.freeze({
    halfLifeMs: 24 * 60 * 60 * 1000,
    pointToleranceMs: 12 * 60 * 60 * 1000,
});

export function semanticScore(queryVector: ArrayLike<number>, messageVector: ArrayLike<number>): number {
    return clamp01(1 - cosineDistance(queryVector, messageVector));
}

/**
 * Fraction of query keywords found in the message. A keyword matches when it
 * equals or is contained in one of the message's keywords, or appears in the
 * content.
 */
export function keywordScore(
    queryKeywords: readonly string[],
    message: Message,
    messageKeywords: readonly string[]
): { score: number; matched: string[] } {
    if (queryKeywords.length === 0) {
        return { score: 0, matched: [] };
    }
    const content = message.content.toLowerCase();
    const matched = queryKeywords.filter(
        (keyword) => content.includes(keyword) || messageKeywords.some((candidate) => candidate.includes(keyword))
    );
    return { score: matched.length / queryKeywords.length, matched };
}

/**
 * 1 inside the hinted range, halving every `halfLifeMs` outside it.
 * Without a hint every message scores 1.
 */
export function temporalScore(
    timestamp: Date,
    hint: TemporalHint | undefined,
    options: TemporalScoringOptions = DEFAULT_TEMPORAL_SCORING
): number {
    if (!hint) return 1;
    const { start, end } = toRange(hint.resolved, options.pointToleranceMs);
    const ts = timestamp.getTime();
    const distance = ts < start.getTime() ? start.getTime() - ts : ts > end.getTime() ? ts - end.getTime() : 0;
    if (distance === 0) return 1;
    return clamp01(Math.pow(0.5, distance / options.halfLifeMs));
}

export function combineScores(
    scores: { semantic: number; keyword: number; temporal: number },
    weights: RankingWeights = DEFAULT_RANKING_WEIGHTS
): number {
    const total = weights.semantic + weights.keyword + weights.temporal;
    if (total <= 0) return 0;
    return clamp01(
        (weights.semantic * scores.semantic + weights.keyword * scores.keyword + weights.temporal * scores.temporal) /
            total
    );
}
