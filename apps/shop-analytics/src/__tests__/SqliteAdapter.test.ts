/**
 * @fileoverview Unit tests for SqliteAdapter and AnalyticsDatabase
 *
 * Uses an in-memory database.
 *
 * @module domain/__tests__/SqliteAdapter
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteAdapter } from "../domain/adapters/SqliteAdapter.js";
import { cartCheckedOut, productViewed } from "../domain/events/index.js";
import { cartSizeProperty, emailProperty, planProperty } from "../domain/properties/index.js";

/**
 * Fixed test timestamp for consistent test results.
 */
const TEST_TIME = new Date("2025-02-15T10:00:00.000Z");

describe("SqliteAdapter", () => {
    let adapter: SqliteAdapter;

    beforeEach(() => {
        adapter = new SqliteAdapter({ path: ":memory:", now: () => TEST_TIME });
        adapter.configure();
    });

    afterEach(() => {
        adapter.close();
    });

    // Scenario: Configure opens the database
    it("should open the database on configure", () => {
        expect(adapter.database.isOpen).toBe(true);
        expect(adapter.database.path).toBe(":memory:");
        expect(adapter.database.countEvents()).toBe(0);
    });

    // Scenario: Events are appended
    it("should store every event", () => {
        adapter.trackEvent(productViewed("SKU-1", 10));
        adapter.trackEvent(cartCheckedOut(42.5, "EUR"));
        adapter.trackEvent(productViewed("SKU-2", 5.5));

        expect(adapter.database.countEvents()).toBe(3);
        expect(adapter.database.countEvents("product-viewed")).toBe(2);
        expect(adapter.database.countEvents("signed-up")).toBe(0);

        const [first] = adapter.database.readEvents();
        expect(first.kind).toBe("product-viewed");
        expect(first.identifier).toBe("Product: Viewed - SKU-1");
        expect(first.metadata).toEqual({ sku: "SKU-1", price: 10 });
        expect(first.trackedAt.toISOString()).toBe("2025-02-15T10:00:00.000Z");
    });

    // Scenario: Properties keep their latest value
    it("should keep one row per property with the latest value", () => {
        adapter.trackProperty(planProperty("free"));
        adapter.trackProperty(planProperty("pro"));
        adapter.trackProperty(cartSizeProperty(3));
        adapter.trackProperty(emailProperty(null));

        const properties = adapter.database.readProperties();

        expect(properties.map((property) => [property.identifier, property.value])).toEqual([
            ["cart_size", 3],
            ["email", null],
            ["plan", "pro"],
        ]);
        expect(properties[0].kind).toBe("cart-size");
        expect(properties[0].updatedAt.toISOString()).toBe("2025-02-15T10:00:00.000Z");
    });

    // Scenario: Reset forgets properties but keeps events
    it("should delete stored properties on reset", () => {
        adapter.trackEvent(productViewed("SKU-1", 10));
        adapter.trackProperty(planProperty("pro"));

        adapter.reset();

        expect(adapter.database.readProperties()).toEqual([]);
        expect(adapter.database.countEvents()).toBe(1);
    });

    // Scenario: Close
    it("should close the database", () => {
        adapter.close();

        expect(adapter.database.isOpen).toBe(false);
    });

    // Scenario: Writes after close fail instead of reopening
    it("should reject writes after close without reopening", () => {
        adapter.close();

        expect(() => adapter.trackEvent(productViewed("SKU-1", 10))).toThrow("Analytics database is closed");
        expect(() => adapter.trackProperty(planProperty("pro"))).toThrow("Analytics database is closed");
        expect(() => adapter.configure()).toThrow("Analytics database is closed");
        expect(adapter.database.isOpen).toBe(false);
    });

    // Scenario: Nothing is written before configure
    it("should reject writes before the database is opened", () => {
        const unopened = new SqliteAdapter({ path: ":memory:", now: () => TEST_TIME });

        expect(() => unopened.trackEvent(productViewed("SKU-1", 10))).toThrow("Analytics database is not open");
        expect(unopened.database.isOpen).toBe(false);
    });
});
