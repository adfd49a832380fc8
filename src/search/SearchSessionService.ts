/**
 * SearchSessionService - multi-turn search where later queries inherit the
 * themes of earlier ones.
 *
 * Handles:
 * - Session lifecycle (start, end, active count)
 * - Implied context: keywords, channels and users that recur in at least two
 *   of the last three turns are added to the next query
 * - Explicit context (extra keywords, focus channels/users)
 * - Refinement of the previous turn
 * - Up to three refinement suggestions per turn
 */

import { randomUUID } from "node:crypto";
import { Mutex } from "@/lib/async";
import { type Clock, systemClock } from "@/lib/clock";
import { NothingToRefineError, SessionNotFoundError } from "@/lib/errors";
import type { HybridSearchEngine } from "./HybridSearchEngine";
import type { QueryParser } from "./QueryParser";
import type { ParsedQuery, SearchFilters, SearchResponse, TemporalHint } from "./types";

export interface SessionSearchContext {
    additionalKeywords?: string[];
    focusChannels?: string[];
    focusUsers?: string[];
}

export type SearchRefinement =
    | { kind: "addKeywords"; keywords: string[] }
    | { kind: "removeKeywords"; keywords: string[] }
    | { kind: "addChannels"; channels: string[] }
    | { kind: "addUsers"; users: string[] }
    | { kind: "changeTimeRange"; start: Date; end: Date };

export type RefinementSuggestionKind =
    | "addTimeFilter"
    | "addChannelFilter"
    | "addUserFilter"
    | "narrowScope"
    | "expandScope"
    | "combineWithPrevious";

export interface RefinementSuggestion {
    kind: RefinementSuggestionKind;
    description: string;
}

export interface SessionSummary {
    sessionId: string;
    turnCount: number;
    recentQueries: string[];
    dominantTopics: string[];
    durationMs: number;
}

export interface SessionSearchResult {
    sessionId: string;
    turnNumber: number;
    query: string;
    enhancedQuery: ParsedQuery;
    response: SearchResponse;
    suggestions: RefinementSuggestion[];
    session: SessionSummary;
}

interface SearchTurn {
    query: string;
    parsed: ParsedQuery;
    enhanced: ParsedQuery;
    resultCount: number;
    refinement?: SearchRefinement;
}

interface SearchSession {
    id: string;
    startedAt: Date;
    lastActivity: Date;
    turns: SearchTurn[];
}

export interface SearchSessionServiceOptions {
    clock?: Clock;
    maxHistory?: number;
    defaultLimit?: number;
}

const IMPLICIT_CONTEXT_TURNS = 3;
const MAX_SUGGESTIONS = 3;

function mergeUnique(...lists: ReadonlyArray<readonly string[] | undefined>): string[] {
    const merged: string[] = [];
    for (const list of lists) {
        for (const value of list ?? []) {
            const normalized = value.trim().toLowerCase();
            if (normalized && !merged.includes(normalized)) merged.push(normalized);
        }
    }
    return merged;
}

/**
 * Values present in at least two of the given turns
 */
function recurring(lists: ReadonlyArray<readonly string[]>): string[] {
    const counts = new Map<string, number>();
    for (const list of lists) {
        for (const value of new Set(list)) {
            counts.set(value, (counts.get(value) ?? 0) + 1);
        }
    }
    return [...counts].filter(([, count]) => count > 1).map(([value]) => value);
}

function withParts(
    query: ParsedQuery,
    parts: { originalText?: string; keywords: string[]; channels: string[]; users: string[]; temporalHint?: TemporalHint }
): ParsedQuery {
    const temporalHint = parts.temporalHint ?? query.temporalHint;
    return Object.freeze({
        originalText: parts.originalText ?? query.originalText,
        intent: query.intent,
        keywords: Object.freeze(parts.keywords),
        entities: query.entities,
        channels: Object.freeze(parts.channels),
        users: Object.freeze(parts.users),
        ...(temporalHint ? { temporalHint } : {}),
    });
}

export function describeRefinement(refinement: SearchRefinement): string {
    switch (refinement.kind) {
        case "addKeywords":
            return `add keywords: ${refinement.keywords.join(", ")}`;
        case "removeKeywords":
            return `remove keywords: ${refinement.keywords.join(", ")}`;
        case "addChannels":
            return `add channels: ${refinement.channels.join(", ")}`;
        case "addUsers":
            return `add users: ${refinement.users.join(", ")}`;
        case "changeTimeRange":
            return `time range: ${refinement.start.toISOString()} to ${refinement.end.toISOString()}`;
    }
}

export function applyRefinement(query: ParsedQuery, refinement: SearchRefinement): ParsedQuery {
    const base = {
        keywords: [...query.keywords],
        channels: [...query.channels],
        users: [...query.users],
    };
    switch (refinement.kind) {
        case "addKeywords":
            return withParts(query, { ...base, keywords: mergeUnique(query.keywords, refinement.keywords) });
        case "removeKeywords": {
            const removed = new Set(refinement.keywords.map((k) => k.toLowerCase()));
            return withParts(query, { ...base, keywords: base.keywords.filter((k) => !removed.has(k)) });
        }
        case "addChannels":
            return withParts(query, { ...base, channels: mergeUnique(query.channels, refinement.channels) });
        case "addUsers":
            return withParts(query, { ...base, users: mergeUnique(query.users, refinement.users) });
        case "changeTimeRange":
            return withParts(query, {
                ...base,
                temporalHint: {
                    kind: "absolute",
                    rawValue: `${refinement.start.toISOString()}..${refinement.end.toISOString()}`,
                    resolved: { kind: "range", start: refinement.start, end: refinement.end },
                },
            });
    }
}

export function suggestRefinements(
    query: ParsedQuery,
    resultCount: number,
    turnCount: number
): RefinementSuggestion[] {
    const suggestions: RefinementSuggestion[] = [];
    if (!query.temporalHint) {
        suggestions.push({ kind: "addTimeFilter", description: "Add a time filter such as 'last week' or 'yesterday'" });
    }
    if (query.channels.length === 0 && resultCount > 0) {
        suggestions.push({ kind: "addChannelFilter", description: "Filter by specific channels" });
    }
    if (query.users.length === 0 && resultCount > 0) {
        suggestions.push({ kind: "addUserFilter", description: "Filter by specific users" });
    }
    if (resultCount >= 8) {
        suggestions.push({ kind: "narrowScope", description: "Narrow the search with more specific terms" });
    }
    if (resultCount <= 2) {
        suggestions.push({ kind: "expandScope", description: "Broaden the search with alternative terms" });
    }
    if (turnCount > 1) {
        suggestions.push({ kind: "combineWithPrevious", description: "Combine with the context of earlier searches" });
    }
    return suggestions.slice(0, MAX_SUGGESTIONS);
}

function resultCountOf(response: SearchResponse): number {
    return response.kind === "results" ? response.results.length : 0;
}

export class SearchSessionService {
    private readonly sessions = new Map<string, SearchSession>();
    private readonly mutex = new Mutex();
    private readonly clock: Clock;
    private readonly maxHistory: number;
    private readonly defaultLimit: number;

    constructor(
        private readonly parser: QueryParser,
        private readonly engine: HybridSearchEngine,
        options: SearchSessionServiceOptions = {}
    ) {
        this.clock = options.clock ?? systemClock;
        this.maxHistory = options.maxHistory ?? 10;
        this.defaultLimit = options.defaultLimit ?? 10;
    }

    startSession(sessionId?: string): Promise<string> {
        return this.mutex.runExclusive(() => {
            const id = sessionId ?? randomUUID();
            const now = this.clock.now();
            this.sessions.set(id, { id, startedAt: now, lastActivity: now, turns: [] });
            return id;
        });
    }

    /**
     * Start the session under the given id unless it is already running
     */
    ensureSession(sessionId: string): Promise<string> {
        return this.mutex.runExclusive(() => {
            if (!this.sessions.has(sessionId)) {
                const now = this.clock.now();
                this.sessions.set(sessionId, { id: sessionId, startedAt: now, lastActivity: now, turns: [] });
            }
            return sessionId;
        });
    }

    endSession(sessionId: string): Promise<boolean> {
        return this.mutex.runExclusive(() => this.sessions.delete(sessionId));
    }

    activeSessionCount(): number {
        return this.sessions.size;
    }

    async search(
        sessionId: string,
        queryText: string,
        options: { context?: SessionSearchContext; limit?: number; filters?: SearchFilters } = {}
    ): Promise<SessionSearchResult> {
        const history = await this.snapshotTurns(sessionId);
        const parsed = this.parser.parse(queryText);
        const enhanced = this.enhance(parsed, history, options.context);
        const response = await this.engine.search(enhanced, {
            limit: options.limit ?? this.defaultLimit,
            filters: options.filters,
        });

        const turn: SearchTurn = { query: queryText, parsed, enhanced, resultCount: resultCountOf(response) };
        const session = await this.recordTurn(sessionId, turn);

        return {
            sessionId,
            turnNumber: session.turns.length,
            query: queryText,
            enhancedQuery: enhanced,
            response,
            suggestions: suggestRefinements(parsed, turn.resultCount, session.turns.length),
            session: this.summarize(session),
        };
    }

    /**
     * Re-run the previous turn's query with one change applied
     *
     * @throws SessionNotFoundError for an unknown or expired session
     * @throws NothingToRefineError when the session has no turns yet
     */
    async refine(sessionId: string, refinement: SearchRefinement, limit?: number): Promise<SessionSearchResult> {
        const history = await this.snapshotTurns(sessionId);
        const last = history[history.length - 1];
        if (!last) {
            throw new NothingToRefineError(sessionId);
        }

        const refined = applyRefinement(last.enhanced, refinement);
        const response = await this.engine.search(refined, { limit: limit ?? this.defaultLimit });
        const query = `${last.query} [refined: ${describeRefinement(refinement)}]`;

        const turn: SearchTurn = {
            query,
            parsed: refined,
            enhanced: refined,
            resultCount: resultCountOf(response),
            refinement,
        };
        const session = await this.recordTurn(sessionId, turn);

        return {
            sessionId,
            turnNumber: session.turns.length,
            query,
            enhancedQuery: refined,
            response,
            suggestions: [],
            session: this.summarize(session),
        };
    }

    private enhance(parsed: ParsedQuery, history: SearchTurn[], context: SessionSearchContext | undefined): ParsedQuery {
        let implied: { keywords: string[]; channels: string[]; users: string[] } = {
            keywords: [],
            channels: [],
            users: [],
        };
        if (history.length >= 2) {
            const recent = history.slice(-IMPLICIT_CONTEXT_TURNS);
            implied = {
                keywords: recurring(recent.map((turn) => turn.parsed.keywords)),
                channels: recurring(recent.map((turn) => turn.parsed.channels)),
                users: recurring(recent.map((turn) => turn.parsed.users)),
            };
        }

        return withParts(parsed, {
            keywords: mergeUnique(parsed.keywords, implied.keywords, context?.additionalKeywords),
            channels: mergeUnique(parsed.channels, implied.channels, context?.focusChannels),
            users: mergeUnique(parsed.users, implied.users, context?.focusUsers),
        });
    }

    private snapshotTurns(sessionId: string): Promise<SearchTurn[]> {
        return this.mutex.runExclusive(() => [...this.requireSession(sessionId).turns]);
    }

    private recordTurn(sessionId: string, turn: SearchTurn): Promise<SearchSession> {
        return this.mutex.runExclusive(() => {
            const session = this.requireSession(sessionId);
            session.turns.push(turn);
            if (session.turns.length > this.maxHistory) {
                session.turns.shift();
            }
            session.lastActivity = this.clock.now();
            return session;
        });
    }

    private requireSession(sessionId: string): SearchSession {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    private summarize(session: SearchSession): SessionSummary {
        const counts = new Map<string, number>();
        for (const turn of session.turns) {
            for (const keyword of turn.parsed.keywords) {
                counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
            }
        }
        const dominantTopics = [...counts]
            .sort((a, b) => b[1] - a[1])
            .slice(0, 5)
            .map(([keyword]) => keyword);

        return {
            sessionId: session.id,
            turnCount: session.turns.length,
            recentQueries: session.turns.slice(-3).map((turn) => turn.query),
            dominantTopics,
            durationMs: this.clock.now().getTime() - session.startedAt.getTime(),
        };
    }
}
