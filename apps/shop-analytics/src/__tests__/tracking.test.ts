/**
 * @fileoverview Integration tests for application tracking
 *
 * Runs the storefront domain through a real TrackingHub with the console
 * adapter (captured output) and the SQLite adapter (in memory).
 *
 * @module __tests__/tracking
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TrackingHub } from "@trackhub/core";
import { startAppTracking, analyticsHub, type AppTracking } from "../tracking.js";
import type { HubSettings } from "../config/index.js";
import { SqliteAdapter } from "../domain/adapters/index.js";
import { cartCheckedOut, heartbeat, signedUp } from "../domain/events/index.js";
import { emailProperty, planProperty } from "../domain/properties/index.js";

/**
 * Fixed test timestamp for consistent test results.
 */
const TEST_TIME = new Date("2025-02-15T10:00:00.000Z");

const settings: HubSettings = {
    loggingLevel: "info",
    adapters    : {
        console: {
            enabled   : true,
            events    : { policy: "prohibit", kinds: ["heartbeat"] },
            properties: { policy: "allow", kinds: ["plan"] },
        },
        jsonl: { enabled: false },
        sqlite: {
            enabled: true,
            path   : ":memory:",
            events : { policy: "allow", kinds: ["product-viewed", "cart-checked-out", "signed-up"] },
        },
    },
};

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function findSqlite(tracking: AppTracking): SqliteAdapter {
    const adapter = tracking.adapters.find((candidate) => candidate instanceof SqliteAdapter);
    if (!(adapter instanceof SqliteAdapter)) {
        throw new Error("SQLite adapter not started");
    }
    return adapter;
}

describe("startAppTracking", () => {
    let hub: TrackingHub;
    let sink: ReturnType<typeof vi.fn>;
    let lines: string[];
    let tracking: AppTracking;

    beforeEach(async () => {
        sink = vi.fn();
        lines = [];
        hub = new TrackingHub({ logger: createMockLogger(), logSink: sink });

        // Tracked before the adapters exist
        hub.track(signedUp("landing-page"));

        tracking = await startAppTracking(settings, hub, {
            write: (line) => lines.push(line),
            now  : () => TEST_TIME,
        });
    });

    afterEach(async () => {
        await tracking.stop();
    });

    // Scenario: Settings applied to the hub
    it("should configure the hub from the settings", () => {
        expect(tracking.hub).toBe(hub);
        expect(hub.state).toBe("configured");
        expect(hub.loggingLevel).toBe("info");
        expect(tracking.adapters).toHaveLength(2);
    });

    // Scenario: A short session routed through both adapters
    it("should route a session through each adapter's rules", async () => {
        hub.update(emailProperty("ada@example.test"));
        hub.update(planProperty("pro"));
        hub.track(heartbeat(1));
        hub.track(cartCheckedOut(42.5, "EUR", "Card"));
        await hub.whenIdle();

        expect(lines).toEqual([
            "[analytics] ready",
            "[analytics] event \"Account: Signed Up\" source=landing-page",
            "[analytics] event \"Account: Email Changed\" cleared=false",
            "[analytics] property plan=pro",
            "[analytics] event \"Checkout: Completed - Card\" total=42.5, currency=EUR",
        ]);

        const database = findSqlite(tracking).database;
        expect(database.countEvents()).toBe(2);
        expect(database.countEvents("signed-up")).toBe(1);
        expect(database.readProperties().map((property) => [property.identifier, property.value])).toEqual([
            ["email", "ada@example.test"],
            ["plan", "pro"],
        ]);
    });

    // Scenario: Delivery log lines follow the same routing
    it("should write one delivery log line per delivered item", async () => {
        hub.update(emailProperty("ada@example.test"));
        hub.update(planProperty("pro"));
        hub.track(heartbeat(1));
        hub.track(cartCheckedOut(42.5, "EUR", "Card"));
        await hub.whenIdle();

        expect(sink.mock.calls.map((call) => call[0])).toEqual([
            "console: event \"Account: Signed Up\"",
            "sqlite: event \"Account: Signed Up\"",
            "sqlite: property \"email\"",
            "console: event \"Account: Email Changed\"",
            "console: property \"plan\"",
            "sqlite: property \"plan\"",
            "console: event \"Checkout: Completed - Card\"",
            "sqlite: event \"Checkout: Completed - Card\"",
        ]);
    });

    // Scenario: Logout
    it("should reset the adapters and keep tracking", async () => {
        hub.update(planProperty("pro"));
        await hub.resetAdapters();
        hub.track(cartCheckedOut(10, "EUR"));
        await hub.whenIdle();

        const database = findSqlite(tracking).database;
        expect(database.readProperties()).toEqual([]);
        expect(database.countEvents()).toBe(2);
        expect(lines).toContain("[analytics] reset");
    });

    // Scenario: Stop shuts down and closes the database
    it("should shut the hub down and close the database on stop", async () => {
        const database = findSqlite(tracking).database;

        await tracking.stop();

        expect(hub.isShutDown).toBe(true);
        expect(database.isOpen).toBe(false);
    });
});

describe("analyticsHub", () => {
    // Scenario: Shared instance starts idle
    it("should be an unconfigured hub until started", () => {
        expect(analyticsHub).toBeInstanceOf(TrackingHub);
        expect(analyticsHub.state).toBe("unconfigured");
    });
});
