/**
 * @fileoverview Hub barrel exports
 *
 * @module @trackhub/core/hub
 */

export {
    TrackingHub,
    type HubConfig,
    type PostponedCount,
} from "./TrackingHub.js";
