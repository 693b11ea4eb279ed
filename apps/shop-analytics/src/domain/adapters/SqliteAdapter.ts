/**
 * @fileoverview SQLite Adapter
 *
 * Stores events and the latest value of each property in a local SQLite
 * database. Reset deletes the stored properties and keeps the events.
 *
 * @module domain/adapters/SqliteAdapter
 */

import {
    formatEventIdentifier,
    type TrackableEvent,
    type TrackableProperty,
    type TrackingAdapter,
    type TrackingRule,
} from "@trackhub/core";

import { AnalyticsDatabase } from "../../adapters/sqlite/services/index.js";

/**
 * Configuration for SqliteAdapter.
 */
export interface SqliteAdapterConfig {
    /** Database file, or ":memory:" */
    readonly path: string;

    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    /** Clock used for stored timestamps (default: current time) */
    readonly now?: () => Date;
}

/**
 * SQLite Adapter
 *
 * @example
 * ```typescript
 * const adapter = new SqliteAdapter({ path: "./data/analytics.db" });
 * await hub.startTracking([adapter]);
 *
 * hub.track(cartCheckedOut(42.5, "EUR"));
 * await hub.whenIdle();
 *
 * console.log(adapter.database.countEvents("cart-checked-out"));
 * // 1
 * ```
 */
export class SqliteAdapter implements TrackingAdapter {
    readonly name = "sqlite";
    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    /** Query access to what the adapter stored */
    readonly database: AnalyticsDatabase;

    private readonly now: () => Date;

    constructor(config: SqliteAdapterConfig) {
        this.database             = new AnalyticsDatabase(config.path);
        this.eventTrackingRule    = config.eventTrackingRule;
        this.propertyTrackingRule = config.propertyTrackingRule;
        this.now                  = config.now ?? (() => new Date());
    }

    configure(): void {
        this.database.open();
    }

    reset(): void {
        this.database.deleteProperties();
    }

    trackEvent(event: TrackableEvent): void {
        this.database.insertEvent(
            event.kind,
            formatEventIdentifier(event.identifier),
            event.metadata,
            this.now()
        );
    }

    trackProperty(property: TrackableProperty): void {
        this.database.upsertProperty(property.kind, property.identifier, property.trackedValue, this.now());
    }

    close(): void {
        this.database.close();
    }
}
