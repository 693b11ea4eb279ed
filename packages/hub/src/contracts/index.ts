/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and value factories shared by the hub and its adapters.
 *
 * @module @trackhub/core/contracts
 */

// Events
export type {
    EventIdentifier,
    EventMetadata,
    TrackableEvent,
} from "./TrackableEvent.js";
export {
    createEvent,
    createEventIdentifier,
    formatEventIdentifier,
} from "./TrackableEvent.js";

// Properties
export type {
    TrackableProperty,
    TrackableValue,
} from "./TrackableProperty.js";
export {
    createProperty,
    getUpdateEvents,
} from "./TrackableProperty.js";

// Rules
export type {
    TrackingPolicy,
    TrackingRule,
} from "./TrackingRule.js";
export {
    createTrackingRule,
    shouldDeliver,
} from "./TrackingRule.js";

// Adapters
export type {
    AdapterOperation,
    TrackingAdapter,
} from "./TrackingAdapter.js";
export { adapterName, DEFAULT_ADAPTER_NAME } from "./TrackingAdapter.js";

// Logging
export type { HubLogger } from "./HubLogger.js";
export { consoleLogger, describeError } from "./HubLogger.js";

// Notifications
export type {
    HubNotificationType,
    Notification,
    NotificationBus,
    NotificationHandler,
    Subscription,
} from "./NotificationBus.js";
export { createNotification } from "./NotificationBus.js";
