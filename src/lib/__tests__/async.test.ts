import { afterEach, describe, expect, it, vi } from "vitest";
import { Mutex, Semaphore, sleep, withRetry, withTimeout } from "@/lib/async";
import { QueryTimeoutError } from "@/lib/errors";

describe("withTimeout", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("should resolve when the promise wins", async () => {
        await expect(withTimeout(Promise.resolve("done"), 1000, "fast op")).resolves.toBe("done");
    });

    it("should reject with QueryTimeoutError when the deadline passes", async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<string>(() => {}), 100, "embed query");
        const assertion = expect(pending).rejects.toBeInstanceOf(QueryTimeoutError);
        await vi.advanceTimersByTimeAsync(100);
        await assertion;
    });
});

describe("withRetry", () => {
    it("should retry until the function succeeds", async () => {
        let calls = 0;
        const result = await withRetry(
            async () => {
                calls++;
                if (calls < 3) throw new Error(`failure ${calls}`);
                return "ok";
            },
            { maxAttempts: 3, baseDelayMs: 0 }
        );
        expect(result).toBe("ok");
        expect(calls).toBe(3);
    });

    it("should rethrow the last error after the final attempt", async () => {
        let calls = 0;
        await expect(
            withRetry(
                async () => {
                    calls++;
                    throw new Error(`failure ${calls}`);
                },
                { maxAttempts: 2, baseDelayMs: 0 }
            )
        ).rejects.toThrow("failure 2");
        expect(calls).toBe(2);
    });

    it("should not retry errors rejected by shouldRetry", async () => {
        const fn = vi.fn(async () => {
            throw new TypeError("bad input");
        });
        await expect(
            withRetry(fn, { maxAttempts: 5, baseDelayMs: 0, shouldRetry: (e) => !(e instanceof TypeError) })
        ).rejects.toThrow("bad input");
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it("should back off exponentially", async () => {
        const delays: number[] = [];
        await expect(
            withRetry(
                async () => {
                    throw new Error("down");
                },
                { maxAttempts: 4, baseDelayMs: 1, onRetry: (_e, _attempt, delay) => delays.push(delay) }
            )
        ).rejects.toThrow("down");
        expect(delays).toEqual([1, 2, 4]);
    });
});

describe("Semaphore", () => {
    it("should reject fewer than one permit", () => {
        expect(() => new Semaphore(0)).toThrow(RangeError);
    });

    it("should never run more tasks than it has permits", async () => {
        const semaphore = new Semaphore(2);
        let running = 0;
        let peak = 0;

        await Promise.all(
            Array.from({ length: 6 }, () =>
                semaphore.run(async () => {
                    running++;
                    peak = Math.max(peak, running);
                    await sleep(5);
                    running--;
                })
            )
        );

        expect(peak).toBe(2);
        expect(semaphore.pending).toBe(0);
    });

    it("should release the permit when the task throws", async () => {
        const semaphore = new Semaphore(1);
        await expect(
            semaphore.run(async () => {
                throw new Error("task failed");
            })
        ).rejects.toThrow("task failed");
        await expect(semaphore.run(async () => "next")).resolves.toBe("next");
    });
});

describe("Mutex", () => {
    it("should serialize critical sections in call order", async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        await Promise.all([
            mutex.runExclusive(async () => {
                events.push("a:start");
                await sleep(10);
                events.push("a:end");
            }),
            mutex.runExclusive(() => {
                events.push("b");
            }),
        ]);

        expect(events).toEqual(["a:start", "a:end", "b"]);
    });
});
