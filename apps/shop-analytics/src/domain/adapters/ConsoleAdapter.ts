/**
 * @fileoverview Console Adapter
 *
 * Writes one human-readable line per event or property. Useful during
 * development, and as the minimal adapter to copy when wiring a real
 * analytics SDK.
 *
 * @module domain/adapters/ConsoleAdapter
 */

import {
    formatEventIdentifier,
    formatLogValue,
    formatMetadata,
    type TrackableEvent,
    type TrackableProperty,
    type TrackingAdapter,
    type TrackingRule,
} from "@trackhub/core";

/**
 * Configuration for ConsoleAdapter.
 */
export interface ConsoleAdapterConfig {
    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    /** Line prefix (default: "[analytics]") */
    readonly prefix?: string;

    /** Output function (default: console.log) */
    readonly write?: (line: string) => void;
}

/**
 * Console Adapter
 *
 * @example
 * ```typescript
 * const adapter = new ConsoleAdapter({
 *     eventTrackingRule: createTrackingRule("prohibit", ["heartbeat"]),
 * });
 *
 * await hub.startTracking([adapter]);
 * hub.track(productViewed("SKU-1042", 19.99));
 * // [analytics] event "Product: Viewed - SKU-1042" sku=SKU-1042, price=19.99
 * ```
 */
export class ConsoleAdapter implements TrackingAdapter {
    readonly name = "console";
    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    private readonly prefix: string;
    private readonly write: (line: string) => void;

    constructor(config: ConsoleAdapterConfig = {}) {
        this.eventTrackingRule    = config.eventTrackingRule;
        this.propertyTrackingRule = config.propertyTrackingRule;
        this.prefix               = config.prefix ?? "[analytics]";
        this.write                = config.write ?? ((line) => console.log(line));
    }

    configure(): void {
        this.write(`${this.prefix} ready`);
    }

    reset(): void {
        this.write(`${this.prefix} reset`);
    }

    trackEvent(event: TrackableEvent): void {
        const identifier = formatEventIdentifier(event.identifier);
        this.write(`${this.prefix} event "${identifier}" ${formatMetadata(event.metadata)}`);
    }

    trackProperty(property: TrackableProperty): void {
        this.write(`${this.prefix} property ${property.identifier}=${formatLogValue(property.trackedValue)}`);
    }
}
