/**
 * @fileoverview Delivery Log
 *
 * One line per delivered event or property, written to a replaceable
 * sink. `info` names the adapter and the item; `verbose` adds the event
 * metadata or the property value.
 *
 * @module @trackhub/core/impl/DeliveryLog
 */

import { consoleLogger, describeError, type HubLogger } from "../contracts/HubLogger.js";
import { formatEventIdentifier, type EventMetadata, type TrackableEvent } from "../contracts/TrackableEvent.js";
import type { TrackableProperty } from "../contracts/TrackableProperty.js";

export type LoggingLevel = "none" | "info" | "verbose";

/**
 * Receives formatted delivery lines.
 */
export type LogSink = (line: string) => void;

export const consoleSink: LogSink = (line) => console.log(line);

const NO_META = "(no meta)";
const NO_VALUE = "(none)";

/**
 * Render any value for a log line.
 */
export function formatLogValue(value: unknown): string {
    if (value === null || value === undefined) {
        return NO_VALUE;
    }
    if (typeof value === "string") {
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value === "object") {
        try {
            return JSON.stringify(value);
        }
        catch {
            return String(value);
        }
    }
    return String(value);
}

/**
 * Render event metadata as `key=value` pairs, or "(no meta)".
 */
export function formatMetadata(metadata: EventMetadata): string {
    const entries = Object.entries(metadata);
    if (entries.length === 0) {
        return NO_META;
    }
    return entries.map(([key, value]) => `${key}=${formatLogValue(value)}`).join(", ");
}

export class DeliveryLog {
    level: LoggingLevel;
    private sink: LogSink;

    constructor(
        level: LoggingLevel = "none",
        sink: LogSink = consoleSink,
        private readonly logger: HubLogger = consoleLogger
    ) {
        this.level = level;
        this.sink = sink;
    }

    /**
     * Replace the output function.
     */
    setSink(sink: LogSink): void {
        this.sink = sink;
    }

    event(adapter: string, event: TrackableEvent): void {
        if (this.level === "none") {
            return;
        }

        let line = `${adapter}: event "${formatEventIdentifier(event.identifier)}"`;
        if (this.level === "verbose") {
            line += ` | ${formatMetadata(event.metadata)}`;
        }

        this.write(line);
    }

    property(adapter: string, property: TrackableProperty): void {
        if (this.level === "none") {
            return;
        }

        let line = `${adapter}: property "${property.identifier}"`;
        if (this.level === "verbose") {
            line += ` | value=${formatLogValue(property.trackedValue)}`;
        }

        this.write(line);
    }

    private write(line: string): void {
        try {
            this.sink(line);
        }
        catch (error) {
            this.logger.warn("Delivery log sink failed", { error: describeError(error) });
        }
    }
}
