/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    ADAPTER_KEYS,
    loadHubSettings,
    loadHubSettingsWithFallback,
    getDefaultHubSettings,
    applyEnvironmentOverrides,
    resolveAdapterPaths,
    type AdapterKey,
    type AdapterSettings,
    type HubSettings,
    type RuleSettings,
    type SettingsEnvironment,
} from "./loadHubSettings.js";
