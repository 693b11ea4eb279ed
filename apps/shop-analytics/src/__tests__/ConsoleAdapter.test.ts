/**
 * @fileoverview Unit tests for ConsoleAdapter
 *
 * @module domain/__tests__/ConsoleAdapter
 */

import { describe, it, expect, vi } from "vitest";
import { adapterName, createTrackingRule } from "@trackhub/core";
import { ConsoleAdapter } from "../domain/adapters/ConsoleAdapter.js";
import { heartbeat, productViewed } from "../domain/events/index.js";
import { emailProperty, planProperty } from "../domain/properties/index.js";

describe("ConsoleAdapter", () => {
    // Scenario: One line per call
    it("should write a line per lifecycle call, event and property", () => {
        const write = vi.fn();
        const adapter = new ConsoleAdapter({ write });

        adapter.configure();
        adapter.trackEvent(productViewed("SKU-1042", 19.99));
        adapter.trackEvent(heartbeat(1));
        adapter.trackProperty(emailProperty("ada@example.test"));
        adapter.trackProperty(planProperty(null));
        adapter.reset();

        expect(write.mock.calls).toEqual([
            ["[analytics] ready"],
            ["[analytics] event \"Product: Viewed - SKU-1042\" sku=SKU-1042, price=19.99"],
            ["[analytics] event \"App: Heartbeat\" sequence=1"],
            ["[analytics] property email=ada@example.test"],
            ["[analytics] property plan=(none)"],
            ["[analytics] reset"],
        ]);
    });

    // Scenario: Custom prefix
    it("should use a custom prefix", () => {
        const write = vi.fn();
        const adapter = new ConsoleAdapter({ write, prefix: "[shop]" });

        adapter.configure();

        expect(write).toHaveBeenCalledWith("[shop] ready");
    });

    // Scenario: Name and rules
    it("should expose its name and the configured rules", () => {
        const rule = createTrackingRule("prohibit", ["heartbeat"]);
        const adapter = new ConsoleAdapter({ eventTrackingRule: rule });

        expect(adapterName(adapter)).toBe("console");
        expect(adapter.eventTrackingRule).toBe(rule);
        expect(adapter.propertyTrackingRule).toBeUndefined();
    });

    // Scenario: Default output
    it("should write to console.log by default", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

        new ConsoleAdapter().reset();

        expect(log).toHaveBeenCalledWith("[analytics] reset");
        log.mockRestore();
    });
});
