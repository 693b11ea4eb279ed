/**
 * @fileoverview Application tracking
 *
 * Holds the hub instance the storefront tracks through and starts it
 * with the adapters named in the settings.
 *
 * @module tracking
 */

import { TrackingHub, type TrackingAdapter } from "@trackhub/core";

import type { HubSettings } from "./config/index.js";
import { createAdapters, closeAdapters, type CreateAdaptersOptions } from "./adapters/index.js";

/**
 * The hub shared by the whole application.
 */
export const analyticsHub = new TrackingHub();

/**
 * A started tracking setup.
 */
export interface AppTracking {
    readonly hub: TrackingHub;
    readonly adapters: readonly TrackingAdapter[];

    /** Shut the hub down, then close adapter resources */
    stop(): Promise<void>;
}

/**
 * Apply settings to a hub, register the enabled adapters and configure
 * them. Calls tracked on the hub before this resolves are delivered
 * once configuring has finished.
 *
 * @param settings - Loaded hub settings
 * @param hub - Hub to start (default: the shared instance)
 * @param options - Adapter options not read from settings
 */
export async function startAppTracking(
    settings: HubSettings,
    hub: TrackingHub = analyticsHub,
    options: CreateAdaptersOptions = {}
): Promise<AppTracking> {
    hub.loggingLevel = settings.loggingLevel;

    const adapters = createAdapters(settings, options);
    await hub.startTracking(adapters);

    return {
        hub,
        adapters,
        stop: async () => {
            await hub.shutdown();
            closeAdapters(adapters);
        },
    };
}
