/**
 * @fileoverview Adapter Factory
 *
 * Builds the enabled adapters from hub settings, in the fixed order
 * console, jsonl, sqlite.
 *
 * @module adapters/createAdapters
 */

import { createTrackingRule, type TrackingAdapter, type TrackingRule } from "@trackhub/core";

import type { AdapterSettings, HubSettings, RuleSettings } from "../config/index.js";
import { ConsoleAdapter, JsonlFileAdapter, SqliteAdapter } from "../domain/adapters/index.js";

/**
 * Options that are not part of the settings file.
 */
export interface CreateAdaptersOptions {
    /** Output function for the console adapter */
    readonly write?: (line: string) => void;

    /** Clock for the file-backed adapters */
    readonly now?: () => Date;
}

/**
 * Build the adapters enabled in the settings.
 *
 * @throws Error if a file-backed adapter is enabled without a path
 *
 * @example
 * ```typescript
 * const adapters = createAdapters(loadHubSettings("./config/hub.yml"));
 * await hub.startTracking(adapters);
 * ```
 */
export function createAdapters(settings: HubSettings, options: CreateAdaptersOptions = {}): TrackingAdapter[] {
    const adapters: TrackingAdapter[] = [];
    const { console: consoleSettings, jsonl, sqlite } = settings.adapters;

    if (consoleSettings.enabled) {
        adapters.push(new ConsoleAdapter({
            ...toRules(consoleSettings),
            write: options.write,
        }));
    }

    if (jsonl.enabled) {
        adapters.push(new JsonlFileAdapter({
            ...toRules(jsonl),
            path: requirePath("jsonl", jsonl),
            now : options.now,
        }));
    }

    if (sqlite.enabled) {
        adapters.push(new SqliteAdapter({
            ...toRules(sqlite),
            path: requirePath("sqlite", sqlite),
            now : options.now,
        }));
    }

    return adapters;
}

/**
 * Close resources held by adapters, such as database connections.
 */
export function closeAdapters(adapters: readonly TrackingAdapter[]): void {
    for (const adapter of adapters) {
        if (adapter instanceof SqliteAdapter) {
            adapter.close();
        }
    }
}

function toRules(settings: AdapterSettings): {
    eventTrackingRule?: TrackingRule;
    propertyTrackingRule?: TrackingRule;
} {
    return {
        eventTrackingRule   : toRule(settings.events),
        propertyTrackingRule: toRule(settings.properties),
    };
}

function toRule(rule: RuleSettings | undefined): TrackingRule | undefined {
    return rule ? createTrackingRule(rule.policy, rule.kinds) : undefined;
}

function requirePath(key: string, settings: AdapterSettings): string {
    if (settings.path === undefined) {
        throw new Error(`Adapter '${key}' is enabled but has no path`);
    }
    return settings.path;
}
