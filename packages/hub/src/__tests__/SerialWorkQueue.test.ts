/**
 * @fileoverview Unit tests for SerialWorkQueue
 *
 * Tests cover:
 * - FIFO order across sync and async jobs
 * - No overlap between async jobs
 * - Failure isolation
 * - whenIdle and close
 *
 * @module @trackhub/core/__tests__/SerialWorkQueue
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { SerialWorkQueue } from "../impl/SerialWorkQueue.js";

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SerialWorkQueue", () => {
    let logger: ReturnType<typeof createMockLogger>;
    let queue: SerialWorkQueue;

    beforeEach(() => {
        logger = createMockLogger();
        queue = new SerialWorkQueue(logger);
    });

    // Scenario: Jobs run in enqueue order even when earlier ones are slower
    it("should run jobs in the order they were enqueued", async () => {
        const order: string[] = [];

        void queue.enqueue("slow", async () => {
            await delay(20);
            order.push("slow");
        });
        void queue.enqueue("fast", () => {
            order.push("fast");
        });

        await queue.whenIdle();

        expect(order).toEqual(["slow", "fast"]);
    });

    // Scenario: Async jobs never overlap
    it("should not start a job before the previous one settles", async () => {
        let running = 0;
        let maxRunning = 0;

        for (let i = 0; i < 3; i++) {
            void queue.enqueue(`job-${i}`, async () => {
                running++;
                maxRunning = Math.max(maxRunning, running);
                await delay(5);
                running--;
            });
        }

        await queue.whenIdle();

        expect(maxRunning).toBe(1);
    });

    // Scenario: A failing job is logged and the next job still runs
    it("should log a failing job and continue", async () => {
        const after = vi.fn();

        const failed = queue.enqueue("broken", () => {
            throw new Error("boom");
        });
        void queue.enqueue("after", after);

        await expect(failed).resolves.toBeUndefined();
        await queue.whenIdle();

        expect(after).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith("Queued job failed", {
            job  : "broken",
            error: "boom",
        });
    });

    // Scenario: Size counts unfinished jobs
    it("should report pending jobs", async () => {
        void queue.enqueue("a", () => delay(5));
        void queue.enqueue("b", () => undefined);

        expect(queue.size).toBe(2);

        await queue.whenIdle();

        expect(queue.size).toBe(0);
    });

    // Scenario: Jobs enqueued by a running job are awaited by whenIdle
    it("should wait for jobs enqueued while waiting", async () => {
        const order: string[] = [];

        void queue.enqueue("outer", () => {
            order.push("outer");
            void queue.enqueue("inner", async () => {
                await delay(5);
                order.push("inner");
            });
        });

        await queue.whenIdle();

        expect(order).toEqual(["outer", "inner"]);
    });

    // Scenario: Closing drains and rejects further work
    it("should finish queued jobs on close and refuse new ones", async () => {
        const job = vi.fn();
        void queue.enqueue("last", job);

        await queue.close();

        expect(job).toHaveBeenCalledTimes(1);
        expect(queue.isClosed).toBe(true);
        expect(() => queue.enqueue("late", job)).toThrow("Work queue is closed");
    });
});
