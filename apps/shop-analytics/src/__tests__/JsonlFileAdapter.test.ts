/**
 * @fileoverview Unit tests for JsonlFileAdapter
 *
 * Writes real files under the OS temp directory.
 *
 * @module domain/__tests__/JsonlFileAdapter
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { JsonlFileAdapter } from "../domain/adapters/JsonlFileAdapter.js";
import { cartCheckedOut, heartbeat } from "../domain/events/index.js";
import { planProperty } from "../domain/properties/index.js";

/**
 * Fixed test timestamp for consistent test results.
 */
const TEST_TIME = new Date("2025-02-15T10:00:00.000Z");

function readLines(path: string): string[] {
    return readFileSync(path, "utf-8").trimEnd().split("\n");
}

describe("JsonlFileAdapter", () => {
    let dir: string;
    let path: string;
    let adapter: JsonlFileAdapter;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "shop-analytics-"));
        path = join(dir, "nested", "events.jsonl");
        adapter = new JsonlFileAdapter({ path, now: () => TEST_TIME });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // Scenario: Configure creates the directory, not the file
    it("should create the parent directory on configure", () => {
        adapter.configure();

        expect(existsSync(join(dir, "nested"))).toBe(true);
        expect(existsSync(path)).toBe(false);
    });

    // Scenario: One JSON object per line
    it("should append one record per event, property and reset", () => {
        adapter.configure();
        adapter.trackEvent(cartCheckedOut(42.5, "EUR", "Card"));
        adapter.trackProperty(planProperty("pro"));
        adapter.reset();

        expect(readLines(path)).toEqual([
            "{\"type\":\"event\",\"kind\":\"cart-checked-out\",\"identifier\":\"Checkout: Completed - Card\",\"metadata\":{\"total\":42.5,\"currency\":\"EUR\"},\"at\":\"2025-02-15T10:00:00.000Z\"}",
            "{\"type\":\"property\",\"kind\":\"plan\",\"identifier\":\"plan\",\"value\":\"pro\",\"at\":\"2025-02-15T10:00:00.000Z\"}",
            "{\"type\":\"reset\",\"at\":\"2025-02-15T10:00:00.000Z\"}",
        ]);
    });

    // Scenario: Appends across configure calls
    it("should keep existing lines when configured again", () => {
        adapter.configure();
        adapter.trackEvent(heartbeat(1));
        adapter.configure();
        adapter.trackEvent(heartbeat(2));

        const records = readLines(path).map((line) => JSON.parse(line));

        expect(records).toHaveLength(2);
        expect(records[0].metadata).toEqual({ sequence: 1 });
        expect(records[1].metadata).toEqual({ sequence: 2 });
        expect(adapter.filePath).toBe(path);
    });
});
