/**
 * @fileoverview Implementation barrel exports
 *
 * Building blocks of the tracking hub.
 *
 * @module @trackhub/core/impl
 */

export { AdapterRegistry, type AdapterFailureHandler } from "./AdapterRegistry.js";
export {
    DeliveryLog,
    consoleSink,
    formatLogValue,
    formatMetadata,
    type LogSink,
    type LoggingLevel,
} from "./DeliveryLog.js";
export { InMemoryNotificationBus } from "./InMemoryNotificationBus.js";
export { LifecycleController, type LifecycleState } from "./LifecycleController.js";
export { PostponementQueue } from "./PostponementQueue.js";
export { SerialWorkQueue, type Job } from "./SerialWorkQueue.js";
