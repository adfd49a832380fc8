/**
 * Concurrency helpers: timeouts, bounded retries and the single-owner
 * primitives (Mutex, Semaphore) that guard shared state.
 */

import { QueryTimeoutError } from "./errors";

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a deadline. The losing timer is always cleared.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    return Promise.race([
        promise,
        new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new QueryTimeoutError(operation, ms)), ms);
        }),
    ]).finally(() => clearTimeout(timer));
}

export interface RetryOptions {
    /** Total attempts including the first one */
    maxAttempts: number;
    baseDelayMs: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry with exponential backoff (base, 2x base, 4x base, ...).
 * Errors rejected by `shouldRetry` are rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.maxAttempts);
    let lastErr: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
        try {
            return await fn();
        } catch (e) {
            lastErr = e;
            if (options.shouldRetry && !options.shouldRetry(e)) {
                throw e;
            }
            if (attempt < attempts - 1) {
                const delay = options.baseDelayMs * Math.pow(2, attempt);
                options.onRetry?.(e, attempt + 1, delay);
                await sleep(delay);
            }
        }
    }
    throw lastErr;
}

/**
 * Counting semaphore. Waiters are released in FIFO order.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    async acquire(): Promise<void> {
        if (this.available > 0) {
            this.available--;
            return;
        }
        await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
        } else if (this.available < this.permits) {
            this.available++;
        }
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    get pending(): number {
        return this.waiters.length;
    }
}

/**
 * Mutual exclusion: callers of `runExclusive` never overlap.
 */
export class Mutex {
    private readonly semaphore = new Semaphore(1);

    runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        return this.semaphore.run(async () => fn());
    }
}
