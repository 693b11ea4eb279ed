/**
 * @fileoverview NotificationBus Contract
 *
 * Lifecycle notifications published by the tracking hub so observers can
 * follow configuration, flushing and adapter failures without wrapping
 * the hub itself.
 *
 * Notifications are about the hub, not the analytics events it forwards.
 *
 * @module @trackhub/core/contracts/NotificationBus
 */

/**
 * Notification payload.
 */
export interface Notification {
    /** Notification type, e.g. "hub:configured" */
    readonly type: string;

    /** ISO timestamp when the notification was emitted */
    readonly timestamp: string;

    /** Additional notification-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Notification types emitted by `TrackingHub`.
 */
export type HubNotificationType =
    | "hub:adaptersSet"
    | "hub:configuring"
    | "hub:configured"
    | "hub:flushed"
    | "hub:reset"
    | "hub:stopped"
    | "adapter:error";

/**
 * Notification handler signature.
 */
export type NotificationHandler = (notification: Notification) => void;

/**
 * Subscription handle returned when subscribing.
 */
export interface Subscription {
    /** Stop receiving notifications */
    unsubscribe(): void;
}

/**
 * NotificationBus interface.
 *
 * @example
 * ```typescript
 * const sub = hub.notifications.subscribe("adapter:error", (notification) => {
 *     console.warn("Adapter failed:", notification.data);
 * });
 *
 * sub.unsubscribe();
 * ```
 */
export interface NotificationBus {
    /**
     * Deliver a notification to every matching subscriber.
     */
    emit(notification: Notification): void;

    /**
     * Subscribe to one notification type, or "*" for all of them.
     *
     * @returns Subscription handle for unsubscribing
     */
    subscribe(type: HubNotificationType | "*", handler: NotificationHandler): Subscription;

    /**
     * Subscribe to the next notification of a type only.
     */
    once(type: HubNotificationType, handler: NotificationHandler): Subscription;

    /**
     * Remove subscriptions for one type, or all of them.
     */
    clear(type?: HubNotificationType | "*"): void;
}

/**
 * Build a notification stamped with the current time.
 */
export function createNotification(
    type: HubNotificationType,
    data?: Record<string, unknown>
): Notification {
    return {
        type,
        timestamp: new Date().toISOString(),
        data,
    };
}
