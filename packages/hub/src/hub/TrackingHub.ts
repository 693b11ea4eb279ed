/**
 * @fileoverview TrackingHub
 *
 * Fans events and properties out to registered adapters.
 *
 * Flow:
 * 1. Adapters are registered with `set()` (or `startTracking()`)
 * 2. Until `configureAdapters()` completes, `track()` / `update()` calls are postponed
 * 3. Configuring awaits every adapter's `configure()`, then replays the
 *    postponed events, then the postponed properties, in submission order
 * 4. After that each call is delivered to every adapter whose rule admits it
 *
 * Every registry change, configure/reset phase and delivery runs on one
 * SerialWorkQueue, so adapters never see two operations at once and
 * calls made in order are delivered in order.
 *
 * @module @trackhub/core/hub/TrackingHub
 */

import type { TrackableEvent } from "../contracts/TrackableEvent.js";
import { getUpdateEvents, type TrackableProperty } from "../contracts/TrackableProperty.js";
import { shouldDeliver } from "../contracts/TrackingRule.js";
import {
    adapterName,
    DEFAULT_ADAPTER_NAME,
    type AdapterOperation,
    type TrackingAdapter,
} from "../contracts/TrackingAdapter.js";
import { consoleLogger, describeError, type HubLogger } from "../contracts/HubLogger.js";
import {
    createNotification,
    type HubNotificationType,
    type NotificationBus,
} from "../contracts/NotificationBus.js";
import { InMemoryNotificationBus } from "../impl/InMemoryNotificationBus.js";
import { AdapterRegistry } from "../impl/AdapterRegistry.js";
import { LifecycleController, type LifecycleState } from "../impl/LifecycleController.js";
import { PostponementQueue } from "../impl/PostponementQueue.js";
import { SerialWorkQueue } from "../impl/SerialWorkQueue.js";
import { DeliveryLog, consoleSink, type LogSink, type LoggingLevel } from "../impl/DeliveryLog.js";

/**
 * Hub configuration options.
 */
export interface HubConfig {
    /** Delivery log level (default: "none") */
    readonly loggingLevel?: LoggingLevel;

    /** Delivery log output (default: console.log) */
    readonly logSink?: LogSink;

    /** Diagnostic logger (default: console) */
    readonly logger?: HubLogger;

    /** Custom NotificationBus (default: InMemoryNotificationBus) */
    readonly notificationBus?: NotificationBus;
}

/**
 * Items waiting for the configure phase.
 */
export interface PostponedCount {
    readonly events: number;
    readonly properties: number;
}

/**
 * TrackingHub - the dispatch core.
 *
 * Create one per application at the composition root and pass it to
 * the code that tracks.
 *
 * @example
 * ```typescript
 * const hub = new TrackingHub({ loggingLevel: "info" });
 *
 * hub.track(signedUp);          // postponed, adapters not configured yet
 *
 * await hub.startTracking([consoleAdapter, fileAdapter]);
 *
 * hub.update(emailProperty);    // delivered on the hub's work queue
 *
 * await hub.shutdown();
 * ```
 */
export class TrackingHub {
    private readonly logger: HubLogger;
    private readonly registry = new AdapterRegistry();
    private readonly lifecycle = new LifecycleController();
    private readonly postponedEvents = new PostponementQueue<TrackableEvent>();
    private readonly postponedProperties = new PostponementQueue<TrackableProperty>();
    private readonly queue: SerialWorkQueue;
    private readonly deliveryLog: DeliveryLog;
    private stopping?: Promise<void>;

    /** Public access to hub lifecycle notifications */
    public readonly notifications: NotificationBus;

    constructor(config: HubConfig = {}) {
        this.logger        = config.logger ?? consoleLogger;
        this.notifications = config.notificationBus ?? new InMemoryNotificationBus(this.logger);
        this.queue         = new SerialWorkQueue(this.logger);
        this.deliveryLog   = new DeliveryLog(
            config.loggingLevel ?? "none",
            config.logSink ?? consoleSink,
            this.logger
        );
    }

    // ------------------------------------------------------------------
    // Registry and lifecycle
    // ------------------------------------------------------------------

    /**
     * Register adapters and configure them.
     *
     * @returns Promise that resolves once configuring and the flush have run
     */
    startTracking(adapters: readonly TrackingAdapter[]): Promise<void> {
        this.set(adapters);
        return this.configureAdapters();
    }

    /**
     * Replace the registered adapters.
     *
     * Queued behind any pending work. Adapters set after configuring are
     * not configured automatically.
     */
    set(adapters: readonly TrackingAdapter[]): void {
        const snapshot = [...adapters];

        void this.schedule("set", () => {
            this.registry.replace(snapshot);
            this.emit("hub:adaptersSet", {
                adapters: snapshot.map((adapter) => this.nameOf(adapter)),
            });
        });
    }

    /**
     * Run every adapter's `configure()` and flush postponed work.
     *
     * Calling this again re-runs every adapter's `configure()`; postponed
     * work is flushed only the first time.
     *
     * @returns Promise that resolves once the configure phase has run
     */
    configureAdapters(): Promise<void> {
        return this.schedule("configure", async () => {
            const firstRun = this.lifecycle.beginConfiguring();
            this.emit("hub:configuring", {
                adapters   : this.registry.size,
                reconfigure: !firstRun,
            });
            this.logger.debug("Configuring adapters", { adapters: this.registry.size });

            await this.registry.configureAll((adapter, operation, error) => {
                this.reportFailure(adapter, operation, error);
            });

            if (this.lifecycle.completeConfiguring()) {
                this.emit("hub:configured", { adapters: this.registry.size });
                this.flushPostponed();
            }
            else {
                this.logger.debug("Adapters reconfigured", { adapters: this.registry.size });
            }
        });
    }

    /**
     * Run every adapter's `reset()`, e.g. on logout.
     *
     * Leaves the registry and the configured state as they are.
     */
    resetAdapters(): Promise<void> {
        return this.schedule("reset", async () => {
            await this.registry.resetAll((adapter, operation, error) => {
                this.reportFailure(adapter, operation, error);
            });
            this.emit("hub:reset", { adapters: this.registry.size });
        });
    }

    // ------------------------------------------------------------------
    // Dispatch
    // ------------------------------------------------------------------

    /**
     * Track an event.
     *
     * Postponed until adapters are configured; afterwards delivered to
     * every adapter whose event rule admits `event.kind`.
     */
    track(event: TrackableEvent): void {
        if (this.rejectWhenShutDown("track", event.kind)) {
            return;
        }

        if (!this.lifecycle.isConfigured) {
            this.postponedEvents.append(event);
            return;
        }

        void this.schedule("track", () => this.deliverEvent(event));
    }

    /**
     * Update a property.
     *
     * Postponed until adapters are configured; afterwards delivered to
     * every adapter whose property rule admits `property.kind`, followed
     * by the property's update events. Update events go out whether or
     * not any adapter accepted the property itself.
     */
    update(property: TrackableProperty): void {
        if (this.rejectWhenShutDown("update", property.kind)) {
            return;
        }

        if (!this.lifecycle.isConfigured) {
            this.postponedProperties.append(property);
            return;
        }

        void this.schedule("update", () => this.deliverProperty(property));
    }

    // ------------------------------------------------------------------
    // Logging
    // ------------------------------------------------------------------

    get loggingLevel(): LoggingLevel {
        return this.deliveryLog.level;
    }

    set loggingLevel(level: LoggingLevel) {
        this.deliveryLog.level = level;
    }

    /**
     * Replace the function delivery log lines are written to.
     */
    log(sink: LogSink): void {
        this.deliveryLog.setSink(sink);
    }

    // ------------------------------------------------------------------
    // Inspection and teardown
    // ------------------------------------------------------------------

    get state(): LifecycleState {
        return this.lifecycle.state;
    }

    /**
     * Registered adapters, as of the last `set()` that has run.
     */
    get adapters(): readonly TrackingAdapter[] {
        return this.registry.list();
    }

    get postponedCount(): PostponedCount {
        return {
            events    : this.postponedEvents.size,
            properties: this.postponedProperties.size,
        };
    }

    get isShutDown(): boolean {
        return this.queue.isClosed;
    }

    /**
     * Resolve once all queued work has run.
     */
    whenIdle(): Promise<void> {
        return this.queue.whenIdle();
    }

    /**
     * Stop accepting calls and wait for queued work to finish.
     * Postponed items that were never flushed are dropped.
     * Every call returns the same promise.
     */
    shutdown(): Promise<void> {
        if (this.stopping === undefined) {
            this.stopping = this.stop();
        }
        return this.stopping;
    }

    // ------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------

    private async stop(): Promise<void> {
        await this.queue.close();

        const dropped = this.postponedCount;
        if (dropped.events > 0 || dropped.properties > 0) {
            this.logger.warn("Hub stopped with postponed items", { ...dropped });
        }

        this.emit("hub:stopped", { ...dropped });
        this.logger.debug("Hub stopped");
    }

    private flushPostponed(): void {
        const events = this.postponedEvents.drain((event) => this.deliverEvent(event));
        const properties = this.postponedProperties.drain((property) => this.deliverProperty(property));

        this.emit("hub:flushed", { events, properties });
        this.logger.debug("Postponed items flushed", { events, properties });
    }

    private deliverEvent(event: TrackableEvent): void {
        for (const adapter of this.registry.list()) {
            this.invoke(adapter, "trackEvent", () => {
                if (!shouldDeliver(adapter.eventTrackingRule, event.kind)) {
                    return;
                }

                this.deliveryLog.event(this.nameOf(adapter), event);
                return adapter.trackEvent(event);
            });
        }
    }

    private deliverProperty(property: TrackableProperty): void {
        for (const adapter of this.registry.list()) {
            this.invoke(adapter, "trackProperty", () => {
                if (!shouldDeliver(adapter.propertyTrackingRule, property.kind)) {
                    return;
                }

                const result = adapter.trackProperty(property);
                this.deliveryLog.property(this.nameOf(adapter), property);
                return result;
            });
        }

        let updateEvents: readonly TrackableEvent[];
        try {
            updateEvents = getUpdateEvents(property);
        }
        catch (error) {
            this.logger.error("Property update events failed", {
                property: property.identifier,
                error   : describeError(error),
            });
            return;
        }

        for (const event of updateEvents) {
            this.deliverEvent(event);
        }
    }

    /**
     * Call an adapter without letting its failure escape.
     * A returned promise is not awaited; its rejection is reported.
     */
    private invoke(
        adapter: TrackingAdapter,
        operation: AdapterOperation,
        call: () => void | PromiseLike<void>
    ): void {
        try {
            const result = call();
            if (isPromiseLike(result)) {
                void Promise.resolve(result).catch((error: unknown) => this.reportFailure(adapter, operation, error));
            }
        }
        catch (error) {
            this.reportFailure(adapter, operation, error);
        }
    }

    private reportFailure(adapter: TrackingAdapter, operation: AdapterOperation, error: unknown): void {
        const data = {
            adapter: this.nameOf(adapter),
            operation,
            error  : describeError(error),
        };

        this.logger.error("Adapter operation failed", data);
        this.emit("adapter:error", data);
    }

    private nameOf(adapter: TrackingAdapter): string {
        try {
            return adapterName(adapter);
        }
        catch (error) {
            this.logger.warn("Adapter name unavailable", { error: describeError(error) });
            return DEFAULT_ADAPTER_NAME;
        }
    }

    private schedule(label: string, job: () => void | Promise<void>): Promise<void> {
        if (this.queue.isClosed) {
            this.logger.warn("Hub is shut down, ignoring call", { operation: label });
            return Promise.resolve();
        }
        return this.queue.enqueue(label, job);
    }

    private rejectWhenShutDown(operation: string, kind: string): boolean {
        if (!this.queue.isClosed) {
            return false;
        }

        this.logger.warn("Hub is shut down, dropping item", { operation, kind });
        return true;
    }

    private emit(type: HubNotificationType, data?: Record<string, unknown>): void {
        this.notifications.emit(createNotification(type, data));
    }
}

function isPromiseLike(value: unknown): value is PromiseLike<void> {
    return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}
