/**
 * @fileoverview Lifecycle Controller
 *
 * Tracks the configure-once transition of a hub:
 *
 *     unconfigured -> configuring -> configured
 *
 * Once configured, the state never goes back.
 *
 * @module @trackhub/core/impl/LifecycleController
 */

export type LifecycleState = "unconfigured" | "configuring" | "configured";

export class LifecycleController {
    private current: LifecycleState = "unconfigured";

    get state(): LifecycleState {
        return this.current;
    }

    get isConfigured(): boolean {
        return this.current === "configured";
    }

    /**
     * Enter the configure phase.
     *
     * @returns True if this is the first configure phase
     */
    beginConfiguring(): boolean {
        if (this.current === "configured") {
            return false;
        }

        this.current = "configuring";
        return true;
    }

    /**
     * Leave the configure phase.
     *
     * @returns True only on the first entry into "configured"; the caller flushes postponed work then
     */
    completeConfiguring(): boolean {
        if (this.current === "configured") {
            return false;
        }

        this.current = "configured";
        return true;
    }
}
