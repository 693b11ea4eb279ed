/**
 * @fileoverview Hub Settings Loader
 *
 * Loads tracking hub settings (logging level, enabled adapters and their
 * rules) from a YAML file and applies environment overrides.
 *
 * @module config/loadHubSettings
 */

import { readFileSync, existsSync } from "fs";
import { isAbsolute, resolve } from "path";
import { parse as parseYaml } from "yaml";
import type { LoggingLevel, TrackingPolicy } from "@trackhub/core";

/**
 * Adapters the application knows how to build.
 */
export const ADAPTER_KEYS = ["console", "jsonl", "sqlite"] as const;

export type AdapterKey = typeof ADAPTER_KEYS[number];

const LOGGING_LEVELS: readonly LoggingLevel[] = ["none", "info", "verbose"];
const POLICIES: readonly TrackingPolicy[] = ["allow", "prohibit"];

/**
 * An allow/prohibit rule as written in the settings file.
 */
export interface RuleSettings {
    readonly policy: TrackingPolicy;
    readonly kinds: readonly string[];
}

/**
 * Settings of one adapter.
 */
export interface AdapterSettings {
    readonly enabled: boolean;

    /** Output file for file-backed adapters */
    readonly path?: string;

    /** Which event kinds the adapter receives. Omitted means all. */
    readonly events?: RuleSettings;

    /** Which property kinds the adapter receives. Omitted means all. */
    readonly properties?: RuleSettings;
}

/**
 * Parsed hub settings.
 */
export interface HubSettings {
    readonly loggingLevel: LoggingLevel;
    readonly adapters: Readonly<Record<AdapterKey, AdapterSettings>>;
}

/**
 * Environment variables read by `applyEnvironmentOverrides()`.
 */
export type SettingsEnvironment = Readonly<Record<string, string | undefined>>;

/**
 * Load hub settings from a YAML file.
 *
 * A missing adapter block disables that adapter; a present block is
 * enabled unless it says `enabled: false`.
 *
 * @param filePath - Path to the hub.yml file
 * @returns Validated settings
 * @throws Error if file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const settings = loadHubSettings("./config/hub.yml");
 * console.log(settings.adapters.console.enabled);
 * // true
 * ```
 */
export function loadHubSettings(filePath: string): HubSettings {
    if (!existsSync(filePath)) {
        throw new Error(`Hub settings file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed)) {
        throw new Error("Invalid hub settings format: expected a mapping");
    }

    const rawAdapters = parsed.adapters ?? {};
    if (!isRecord(rawAdapters)) {
        throw new Error("Invalid hub settings format: 'adapters' must be a mapping");
    }

    for (const key of Object.keys(rawAdapters)) {
        if (!isAdapterKey(key)) {
            throw new Error(`Unknown adapter '${key}', expected one of: ${ADAPTER_KEYS.join(", ")}`);
        }
    }

    return {
        loggingLevel: parsed.loggingLevel === undefined ? "none" : parseLoggingLevel(parsed.loggingLevel, "loggingLevel"),
        adapters    : {
            console: parseAdapter("console", rawAdapters.console),
            jsonl  : parseAdapter("jsonl", rawAdapters.jsonl),
            sqlite : parseAdapter("sqlite", rawAdapters.sqlite),
        },
    };
}

/**
 * Load hub settings with fallback to the defaults.
 *
 * @param filePath - Path to the hub.yml file
 * @returns Settings from the file, or the defaults when it cannot be loaded
 */
export function loadHubSettingsWithFallback(filePath: string): HubSettings {
    try {
        return loadHubSettings(filePath);
    }
    catch (error) {
        console.warn(`Failed to load hub settings from ${filePath}:`, error);
        return getDefaultHubSettings();
    }
}

/**
 * Get default hub settings: console adapter only, no delivery log.
 */
export function getDefaultHubSettings(): HubSettings {
    return {
        loggingLevel: "none",
        adapters    : {
            console: { enabled: true },
            jsonl  : { enabled: false, path: "./data/events.jsonl" },
            sqlite : { enabled: false, path: "./data/analytics.db" },
        },
    };
}

/**
 * Apply environment overrides.
 *
 * - `TRACKHUB_LOG_LEVEL` replaces `loggingLevel`
 * - `TRACKHUB_DATA_DIR` becomes the base of relative adapter paths
 *
 * @throws Error if `TRACKHUB_LOG_LEVEL` is not a known level
 */
export function applyEnvironmentOverrides(settings: HubSettings, env: SettingsEnvironment): HubSettings {
    let result = settings;

    const level = env.TRACKHUB_LOG_LEVEL;
    if (level !== undefined && level !== "") {
        result = { ...result, loggingLevel: parseLoggingLevel(level, "TRACKHUB_LOG_LEVEL") };
    }

    const dataDir = env.TRACKHUB_DATA_DIR;
    if (dataDir !== undefined && dataDir !== "") {
        result = resolveAdapterPaths(result, dataDir);
    }

    return result;
}

/**
 * Resolve relative adapter paths against a base directory.
 * Absolute paths are left as they are.
 */
export function resolveAdapterPaths(settings: HubSettings, baseDir: string): HubSettings {
    const resolvePath = (adapter: AdapterSettings): AdapterSettings => {
        if (adapter.path === undefined || isAbsolute(adapter.path)) {
            return adapter;
        }
        return { ...adapter, path: resolve(baseDir, adapter.path) };
    };

    return {
        ...settings,
        adapters: {
            console: resolvePath(settings.adapters.console),
            jsonl  : resolvePath(settings.adapters.jsonl),
            sqlite : resolvePath(settings.adapters.sqlite),
        },
    };
}

// ----------------------------------------------------------------------
// Validation helpers
// ----------------------------------------------------------------------

function parseAdapter(key: AdapterKey, raw: unknown): AdapterSettings {
    const defaults = getDefaultHubSettings().adapters[key];

    if (raw === undefined || raw === null) {
        return { ...defaults, enabled: false };
    }

    if (!isRecord(raw)) {
        throw new Error(`Invalid adapter '${key}': expected a mapping`);
    }

    const { enabled, path } = raw;

    if (enabled !== undefined && typeof enabled !== "boolean") {
        throw new Error(`Invalid adapter '${key}': 'enabled' must be true or false`);
    }

    if (path !== undefined && (typeof path !== "string" || path === "")) {
        throw new Error(`Invalid adapter '${key}': 'path' must be a non-empty string`);
    }

    const settings: {
        enabled: boolean;
        path?: string;
        events?: RuleSettings;
        properties?: RuleSettings;
    } = {
        enabled: enabled ?? true,
    };

    const resolvedPath = path ?? defaults.path;
    if (resolvedPath !== undefined) {
        settings.path = resolvedPath;
    }

    if (raw.events !== undefined) {
        settings.events = parseRule(`${key}.events`, raw.events);
    }

    if (raw.properties !== undefined) {
        settings.properties = parseRule(`${key}.properties`, raw.properties);
    }

    return settings;
}

function parseRule(field: string, raw: unknown): RuleSettings {
    if (!isRecord(raw)) {
        throw new Error(`Invalid rule '${field}': expected a mapping`);
    }

    const policies = POLICIES.filter((policy) => raw[policy] !== undefined);
    if (policies.length !== 1) {
        throw new Error(`Invalid rule '${field}': expected exactly one of 'allow' or 'prohibit'`);
    }

    const [policy] = policies;
    const kinds = raw[policy];

    if (!Array.isArray(kinds) || !kinds.every((kind) => typeof kind === "string")) {
        throw new Error(`Invalid rule '${field}.${policy}': expected a list of kinds`);
    }

    return { policy, kinds: kinds.filter((kind): kind is string => typeof kind === "string") };
}

function parseLoggingLevel(raw: unknown, field: string): LoggingLevel {
    const level = LOGGING_LEVELS.find((candidate) => candidate === raw);
    if (level === undefined) {
        throw new Error(`Invalid ${field} '${String(raw)}', expected one of: ${LOGGING_LEVELS.join(", ")}`);
    }
    return level;
}

function isAdapterKey(key: string): key is AdapterKey {
    return ADAPTER_KEYS.some((candidate) => candidate === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
