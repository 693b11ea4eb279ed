/**
 * @fileoverview In-Memory NotificationBus Implementation
 *
 * @module @trackhub/core/impl/InMemoryNotificationBus
 */

import type {
    HubNotificationType,
    Notification,
    NotificationBus,
    NotificationHandler,
    Subscription,
} from "../contracts/NotificationBus.js";
import { consoleLogger, describeError, type HubLogger } from "../contracts/HubLogger.js";

/**
 * Synchronous in-memory NotificationBus.
 *
 * - Handlers run in subscription order, specific handlers before "*" handlers
 * - A throwing handler is logged and the rest still run
 *
 * @example
 * ```typescript
 * const bus = new InMemoryNotificationBus();
 *
 * bus.subscribe("hub:configured", () => {
 *     console.log("Adapters ready");
 * });
 *
 * bus.emit(createNotification("hub:configured"));
 * ```
 */
export class InMemoryNotificationBus implements NotificationBus {
    private readonly handlers: Map<string, Set<NotificationHandler>> = new Map();

    constructor(private readonly logger: HubLogger = consoleLogger) {}

    emit(notification: Notification): void {
        this.dispatch(this.handlers.get(notification.type), notification);
        this.dispatch(this.handlers.get("*"), notification);
    }

    subscribe(type: HubNotificationType | "*", handler: NotificationHandler): Subscription {
        let handlers = this.handlers.get(type);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(type, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(type);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(type);
                    }
                }
            },
        };
    }

    once(type: HubNotificationType, handler: NotificationHandler): Subscription {
        const subscription = this.subscribe(type, (notification) => {
            subscription.unsubscribe();
            handler(notification);
        });

        return subscription;
    }

    clear(type?: HubNotificationType | "*"): void {
        if (type === undefined || type === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(type);
        }
    }

    /**
     * Number of handlers subscribed to a type. Useful for testing.
     */
    handlerCount(type: HubNotificationType | "*"): number {
        return this.handlers.get(type)?.size ?? 0;
    }

    private dispatch(handlers: Set<NotificationHandler> | undefined, notification: Notification): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-iteration
        for (const handler of [...handlers]) {
            try {
                handler(notification);
            }
            catch (error) {
                this.logger.error("Notification handler failed", {
                    type : notification.type,
                    error: describeError(error),
                });
            }
        }
    }
}
