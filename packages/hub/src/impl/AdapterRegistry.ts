/**
 * @fileoverview Adapter Registry
 *
 * The ordered list of adapters a hub delivers to. The list is replaced
 * wholesale; there is no add/remove and no de-duplication.
 *
 * @module @trackhub/core/impl/AdapterRegistry
 */

import type { AdapterOperation, TrackingAdapter } from "../contracts/TrackingAdapter.js";

/**
 * Called when an adapter's `configure()` or `reset()` throws or rejects.
 */
export type AdapterFailureHandler = (
    adapter: TrackingAdapter,
    operation: AdapterOperation,
    error: unknown
) => void;

export class AdapterRegistry {
    private adapters: readonly TrackingAdapter[] = [];

    /**
     * Replace every registered adapter with the given list.
     * The list is copied; later changes to the caller's array have no effect.
     */
    replace(adapters: readonly TrackingAdapter[]): void {
        this.adapters = Object.freeze([...adapters]);
    }

    /**
     * Registered adapters in registration order.
     */
    list(): readonly TrackingAdapter[] {
        return this.adapters;
    }

    get size(): number {
        return this.adapters.length;
    }

    /**
     * Await each adapter's `configure()` in registration order.
     */
    async configureAll(onFailure: AdapterFailureHandler): Promise<void> {
        for (const adapter of this.adapters) {
            try {
                await adapter.configure();
            }
            catch (error) {
                onFailure(adapter, "configure", error);
            }
        }
    }

    /**
     * Await each adapter's `reset()` in registration order.
     * Adapters without `reset()` are skipped.
     */
    async resetAll(onFailure: AdapterFailureHandler): Promise<void> {
        for (const adapter of this.adapters) {
            if (!adapter.reset) {
                continue;
            }

            try {
                await adapter.reset();
            }
            catch (error) {
                onFailure(adapter, "reset", error);
            }
        }
    }
}
