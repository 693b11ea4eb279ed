/**
 * @fileoverview Shop Analytics - Main Entry Point
 *
 * Plays a short storefront session through the shared tracking hub:
 * 1. Load settings from config/hub.yml and the environment
 * 2. Track a sign-up before any adapter is configured (postponed)
 * 3. Start tracking, which configures the adapters and flushes the sign-up
 * 4. Browse, update shopper properties, check out, log out (reset)
 * 5. Shut down
 *
 * @module shop-analytics
 */

// Load .env before reading any settings
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import type { TrackingHub } from "@trackhub/core";

import {
    applyEnvironmentOverrides,
    loadHubSettingsWithFallback,
    resolveAdapterPaths,
} from "./config/index.js";
import {
    cartCheckedOut,
    cartSizeProperty,
    emailProperty,
    heartbeat,
    planProperty,
    productViewed,
    signedUp,
} from "./domain/index.js";
import { analyticsHub, startAppTracking } from "./tracking.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const APP_ROOT = join(__dirname, "..");

/**
 * Print hub lifecycle notifications.
 */
function observe(hub: TrackingHub): void {
    hub.notifications.subscribe("hub:configured", (notification) => {
        console.log("[HUB] Configured", notification.data ?? "");
    });

    hub.notifications.subscribe("hub:flushed", (notification) => {
        console.log("[HUB] Flushed postponed items", notification.data ?? "");
    });

    hub.notifications.subscribe("hub:reset", () => {
        console.log("[HUB] Adapters reset");
    });

    hub.notifications.subscribe("hub:stopped", () => {
        console.log("[HUB] Stopped");
    });

    hub.notifications.subscribe("adapter:error", (notification) => {
        console.error("[HUB ERROR]", notification.data ?? "");
    });
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    console.log("=".repeat(60));
    console.log("Shop Analytics");
    console.log("=".repeat(60));

    const settingsPath = join(APP_ROOT, "config", "hub.yml");
    const settings = resolveAdapterPaths(
        applyEnvironmentOverrides(loadHubSettingsWithFallback(settingsPath), process.env),
        APP_ROOT
    );

    const enabled = Object.entries(settings.adapters)
        .filter(([, adapter]) => adapter.enabled)
        .map(([key]) => key);
    console.log(`[INFO] Delivery log level: ${settings.loggingLevel}`);
    console.log(`[INFO] Enabled adapters: ${enabled.join(", ") || "(none)"}`);

    observe(analyticsHub);

    // Tracked before any adapter is configured
    analyticsHub.track(signedUp("landing-page"));

    const tracking = await startAppTracking(settings);
    const hub = tracking.hub;

    hub.update(emailProperty("shopper@example.test"));
    hub.update(planProperty("free"));
    hub.track(productViewed("SKU-1042", 19.99));
    hub.track(productViewed("SKU-2001", 5.5));
    hub.update(cartSizeProperty(2));
    hub.track(heartbeat(1));
    hub.track(cartCheckedOut(25.49, "EUR", "Card"));
    hub.update(cartSizeProperty(0));
    hub.update(planProperty("pro"));

    // Logout
    await hub.whenIdle();
    await hub.resetAdapters();

    await tracking.stop();
}

main().catch((error: unknown) => {
    console.error("[FATAL] Failed to run session:", error);
    process.exitCode = 1;
});
