/**
 * DeduplicationGate - classifies each captured message against what has
 * already been ingested.
 *
 * Transitions per dedup key:
 * - no record                      -> new (version 1)
 * - same hash, same reactions      -> duplicate (no write)
 * - different hash                 -> updated (version + 1, editedAt recorded)
 * - same hash, different reactions -> reactionsUpdated (hash and version kept)
 *
 * The whole check-then-act sequence runs under one Mutex, so two captures of
 * the same message can never both be classified as new.
 *
 * restore() undoes a decision whose write failed, as long as no later decision
 * for the same key has replaced it. A rolled-back new message either takes its
 * scope's watermark back with it or, when a later message has moved the
 * watermark on, stays eligible for a retry past the ordering check.
 */

import { Mutex } from "@/lib/async";
import { type Clock, systemClock } from "@/lib/clock";
import { OutOfOrderMessageError } from "@/lib/errors";
import { type DedupKeyPolicy, computeContentHash, computeDedupKey } from "@/messages/dedupKey";
import type { Message } from "@/messages/types";
import type { DedupIndex, DeduplicationRecord } from "@/services/store/types";

export type DeduplicationResult =
    | { kind: "new"; id: string; record: DeduplicationRecord }
    | { kind: "duplicate"; id: string; record: DeduplicationRecord }
    | { kind: "updated"; id: string; version: number; record: DeduplicationRecord }
    | { kind: "reactionsUpdated"; id: string; record: DeduplicationRecord };

export interface GateDecision {
    result: DeduplicationResult;
    /** State before this decision, for restore() */
    previous: DeduplicationRecord | null;
    /** Ordering scope of a new message and its watermark before the message was accepted */
    watermark?: { scope: string; before: Date | null };
}

export interface DeduplicationGateOptions {
    keyPolicy?: DedupKeyPolicy;
    clock?: Clock;
}

export function reactionsEqual(a: Record<string, number>, b: Record<string, number>): boolean {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Ordering scope: the thread when the message belongs to one, else the channel
 */
export function orderingScope(message: Pick<Message, "channel" | "threadId">): string {
    return message.threadId ? `${message.channel}/${message.threadId}` : message.channel;
}

export class DeduplicationGate {
    private readonly mutex = new Mutex();
    private readonly keyPolicy: DedupKeyPolicy;
    private readonly clock: Clock;

    constructor(
        private readonly index: DedupIndex,
        options: DeduplicationGateOptions = {}
    ) {
        this.keyPolicy = options.keyPolicy ?? "message-id";
        this.clock = options.clock ?? systemClock;
    }

    keyFor(message: Message): string {
        return computeDedupKey(message, this.keyPolicy);
    }

    /**
     * Classify and record a message.
     *
     * @throws OutOfOrderMessageError for an unseen message older than its scope's watermark
     */
    async process(message: Message): Promise<GateDecision> {
        return this.mutex.runExclusive(async () => {
            const dedupKey = this.keyFor(message);
            const contentHash = computeContentHash(message);
            const reactions = message.metadata?.reactions;
            const existing = await this.index.get(dedupKey);

            if (!existing) {
                const scope = orderingScope(message);
                const watermark = await this.index.getWatermark(scope);
                const olderThanWatermark = watermark !== null && message.timestamp.getTime() < watermark.getTime();
                const retryPending = await this.index.isRetryPending(dedupKey);
                if (olderThanWatermark && !retryPending) {
                    throw new OutOfOrderMessageError(message.id, scope, message.timestamp, watermark);
                }

                const record: DeduplicationRecord = {
                    dedupKey,
                    messageId: message.id,
                    contentHash,
                    version: 1,
                    lastReactions: { ...(reactions ?? {}) },
                    timestamp: message.timestamp,
                };
                await this.index.put(record);
                if (!olderThanWatermark) {
                    await this.index.setWatermark(scope, message.timestamp);
                }
                if (retryPending) {
                    await this.index.setRetryPending(dedupKey, false);
                }
                return {
                    result: { kind: "new", id: message.id, record },
                    previous: null,
                    watermark: { scope, before: watermark },
                };
            }

            if (existing.contentHash !== contentHash) {
                const record: DeduplicationRecord = {
                    ...existing,
                    contentHash,
                    version: existing.version + 1,
                    lastReactions: reactions ? { ...reactions } : existing.lastReactions,
                    editedAt: message.metadata?.editedAt ?? this.clock.now(),
                };
                await this.index.put(record);
                return {
                    result: { kind: "updated", id: existing.messageId, version: record.version, record },
                    previous: existing,
                };
            }

            // Captures that carry no reaction data say nothing about reactions
            if (reactions && !reactionsEqual(reactions, existing.lastReactions)) {
                const record: DeduplicationRecord = { ...existing, lastReactions: { ...reactions } };
                await this.index.put(record);
                return {
                    result: { kind: "reactionsUpdated", id: existing.messageId, record },
                    previous: existing,
                };
            }

            return { result: { kind: "duplicate", id: existing.messageId, record: existing }, previous: existing };
        });
    }

    /**
     * Undo a decision whose follow-up write failed.
     *
     * @param origin - Earliest unwritten decision for the same key, whose prior state is the one to put back
     * @returns false when a later decision for the key has replaced this one and the index was left alone
     */
    async restore(decision: GateDecision, origin: GateDecision = decision): Promise<boolean> {
        return this.mutex.runExclusive(async () => {
            const { record } = decision.result;
            const current = await this.index.get(record.dedupKey);
            if (!current || current.contentHash !== record.contentHash || current.version !== record.version) {
                return false;
            }

            if (origin.previous) {
                await this.index.put(origin.previous);
                return true;
            }

            await this.index.delete(record.dedupKey);
            if (origin.watermark) {
                await this.releaseWatermark(origin.watermark.scope, record, origin.watermark.before);
            }
            return true;
        });
    }

    private async releaseWatermark(scope: string, record: DeduplicationRecord, watermarkBefore: Date | null): Promise<void> {
        const watermark = await this.index.getWatermark(scope);
        if (watermark && watermark.getTime() === record.timestamp.getTime()) {
            await this.index.setWatermark(scope, watermarkBefore);
        } else if (watermark && watermark.getTime() > record.timestamp.getTime()) {
            await this.index.setRetryPending(record.dedupKey, true);
        }
    }
}
