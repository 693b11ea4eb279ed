/**
 * @fileoverview Postponement Queue
 *
 * Holds items submitted before the adapters finished configuring, then
 * replays them once, in submission order.
 *
 * @module @trackhub/core/impl/PostponementQueue
 */

/**
 * FIFO buffer replayed exactly once.
 *
 * Items are removed only after they have been replayed. Items appended
 * while a replay is running are drained after the current batch.
 *
 * @example
 * ```typescript
 * const pending = new PostponementQueue<TrackableEvent>();
 * pending.append(event);
 *
 * const replayed = pending.drain((item) => deliver(item));
 * ```
 */
export class PostponementQueue<T> {
    private items: T[] = [];

    /**
     * Queue an item for later replay.
     */
    append(item: T): void {
        this.items.push(item);
    }

    /**
     * Number of items waiting.
     */
    get size(): number {
        return this.items.length;
    }

    /**
     * Copy of the waiting items, oldest first.
     */
    snapshot(): readonly T[] {
        return [...this.items];
    }

    /**
     * Replay every waiting item in order and remove it.
     *
     * @param replay - Called once per item
     * @returns Number of items replayed
     */
    drain(replay: (item: T) => void): number {
        let replayed = 0;

        while (this.items.length > 0) {
            const batch = this.items.slice();

            for (const item of batch) {
                replay(item);
            }

            this.items.splice(0, batch.length);
            replayed += batch.length;
        }

        return replayed;
    }
}
