/**
 * @fileoverview Serial Work Queue
 *
 * The single execution context of a tracking hub. Jobs run one at a
 * time in the order they were enqueued; an async job holds the queue
 * until it settles.
 *
 * @module @trackhub/core/impl/SerialWorkQueue
 */

import { consoleLogger, describeError, type HubLogger } from "../contracts/HubLogger.js";

/**
 * A unit of work. May be sync or async.
 */
export type Job = () => void | Promise<void>;

/**
 * FIFO job queue built on a promise chain.
 *
 * A failing job is logged and the chain continues with the next one,
 * so the promise returned by `enqueue()` never rejects.
 *
 * @example
 * ```typescript
 * const queue = new SerialWorkQueue();
 *
 * void queue.enqueue("configure", async () => {
 *     await adapter.configure();
 * });
 * void queue.enqueue("deliver", () => adapter.trackEvent(event));
 *
 * await queue.close();
 * ```
 */
export class SerialWorkQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;
    private closed = false;

    constructor(private readonly logger: HubLogger = consoleLogger) {}

    /**
     * Append a job.
     *
     * @param label - Name used when the job fails
     * @param job - The work to run
     * @returns Promise that settles once the job has run
     * @throws Error if the queue is closed
     */
    enqueue(label: string, job: Job): Promise<void> {
        if (this.closed) {
            throw new Error("Work queue is closed");
        }

        this.pending++;

        const run = this.tail.then(async () => {
            try {
                await job();
            }
            catch (error) {
                this.logger.error("Queued job failed", {
                    job  : label,
                    error: describeError(error),
                });
            }
            finally {
                this.pending--;
            }
        });

        this.tail = run;
        return run;
    }

    /**
     * Jobs enqueued but not yet finished.
     */
    get size(): number {
        return this.pending;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Resolve once the queue is empty, including jobs enqueued by
     * running jobs while waiting.
     */
    async whenIdle(): Promise<void> {
        let current = this.tail;
        await current;

        while (current !== this.tail) {
            current = this.tail;
            await current;
        }
    }

    /**
     * Stop accepting jobs and wait for the queued ones to finish.
     */
    async close(): Promise<void> {
        this.closed = true;
        await this.whenIdle();
    }
}
