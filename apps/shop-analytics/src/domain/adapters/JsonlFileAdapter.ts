/**
 * @fileoverview JSONL File Adapter
 *
 * Appends one JSON object per line for every event, property and reset
 * it receives. The file can be tailed, or loaded by any tool that reads
 * newline-delimited JSON.
 *
 * Record shapes:
 * - `{"type":"event","kind":...,"identifier":...,"metadata":{...},"at":...}`
 * - `{"type":"property","kind":...,"identifier":...,"value":...,"at":...}`
 * - `{"type":"reset","at":...}`
 *
 * @module domain/adapters/JsonlFileAdapter
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

import {
    formatEventIdentifier,
    type TrackableEvent,
    type TrackableProperty,
    type TrackingAdapter,
    type TrackingRule,
} from "@trackhub/core";

/**
 * One line of the output file.
 */
export type JsonlRecord =
    | {
        type: "event";
        kind: string;
        identifier: string;
        metadata: Record<string, unknown>;
        at: string;
    }
    | {
        type: "property";
        kind: string;
        identifier: string;
        value: TrackableProperty["trackedValue"];
        at: string;
    }
    | {
        type: "reset";
        at: string;
    };

/**
 * Configuration for JsonlFileAdapter.
 */
export interface JsonlFileAdapterConfig {
    /** Output file; its directory is created on configure */
    readonly path: string;

    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    /** Clock used for the `at` field (default: current time) */
    readonly now?: () => Date;
}

/**
 * JSONL File Adapter
 */
export class JsonlFileAdapter implements TrackingAdapter {
    readonly name = "jsonl";
    readonly eventTrackingRule?: TrackingRule;
    readonly propertyTrackingRule?: TrackingRule;

    private readonly path: string;
    private readonly now: () => Date;

    constructor(config: JsonlFileAdapterConfig) {
        this.path                 = config.path;
        this.eventTrackingRule    = config.eventTrackingRule;
        this.propertyTrackingRule = config.propertyTrackingRule;
        this.now                  = config.now ?? (() => new Date());
    }

    get filePath(): string {
        return this.path;
    }

    configure(): void {
        mkdirSync(dirname(this.path), { recursive: true });
    }

    reset(): void {
        this.append({ type: "reset", at: this.timestamp() });
    }

    trackEvent(event: TrackableEvent): void {
        this.append({
            type      : "event",
            kind      : event.kind,
            identifier: formatEventIdentifier(event.identifier),
            metadata  : { ...event.metadata },
            at        : this.timestamp(),
        });
    }

    trackProperty(property: TrackableProperty): void {
        this.append({
            type      : "property",
            kind      : property.kind,
            identifier: property.identifier,
            value     : property.trackedValue,
            at        : this.timestamp(),
        });
    }

    private append(record: JsonlRecord): void {
        appendFileSync(this.path, `${JSON.stringify(record)}\n`, "utf-8");
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
