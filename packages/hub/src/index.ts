/**
 * @fileoverview Tracking hub core
 *
 * Emit typed events and properties once; the hub forwards each to every
 * registered analytics adapter whose rules admit it.
 *
 * The core provides:
 * - Per-adapter allow/prohibit rules over event and property kinds
 * - Postponement of calls made before adapters are configured
 * - Serialized, ordered delivery on a single work queue
 * - Delivery logging and lifecycle notifications
 *
 * @module @trackhub/core
 * @example
 * ```typescript
 * import {
 *     TrackingHub,
 *     createEvent,
 *     createEventIdentifier,
 *     createTrackingRule,
 *     type TrackingAdapter,
 * } from "@trackhub/core";
 *
 * const hub = new TrackingHub({ loggingLevel: "info" });
 * await hub.startTracking([consoleAdapter]);
 *
 * hub.track(createEvent("signed-up", createEventIdentifier("Account", "Signed Up")));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    EventIdentifier,
    EventMetadata,
    TrackableEvent,
    TrackableProperty,
    TrackableValue,
    TrackingPolicy,
    TrackingRule,
    AdapterOperation,
    TrackingAdapter,
    HubLogger,
    HubNotificationType,
    Notification,
    NotificationBus,
    NotificationHandler,
    Subscription,
} from "./contracts/index.js";
export {
    createEvent,
    createEventIdentifier,
    formatEventIdentifier,
    createProperty,
    getUpdateEvents,
    createTrackingRule,
    shouldDeliver,
    adapterName,
    DEFAULT_ADAPTER_NAME,
    consoleLogger,
    describeError,
    createNotification,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    AdapterRegistry,
    DeliveryLog,
    InMemoryNotificationBus,
    LifecycleController,
    PostponementQueue,
    SerialWorkQueue,
    consoleSink,
    formatLogValue,
    formatMetadata,
    type AdapterFailureHandler,
    type Job,
    type LifecycleState,
    type LogSink,
    type LoggingLevel,
} from "./impl/index.js";

// ============================================================================
// Hub exports
// ============================================================================

export {
    TrackingHub,
    type HubConfig,
    type PostponedCount,
} from "./hub/index.js";
