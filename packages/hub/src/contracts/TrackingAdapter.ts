/**
 * Tracking Adapter Contract
 *
 * Adapters are the targets the hub fans events and properties out to,
 * typically wrappers around an analytics SDK. The hub only holds
 * references to them; the registering code owns their lifetime.
 *
 * Rules:
 * - `configure()` is awaited once per `configureAdapters()` call, in
 *   registration order, before anything is delivered
 * - `trackEvent()` / `trackProperty()` are fire-and-forget: a returned
 *   promise is not awaited, and failures are logged, never rethrown
 * - One failing adapter never blocks delivery to the others
 */

import type { TrackableEvent } from "./TrackableEvent.js";
import type { TrackableProperty } from "./TrackableProperty.js";
import type { TrackingRule } from "./TrackingRule.js";

/**
 * Tracking Adapter interface.
 *
 * Everything except `configure`, `trackEvent` and `trackProperty` is optional.
 *
 * @example
 * ```typescript
 * const revenueAdapter: TrackingAdapter = {
 *     name             : "revenue",
 *     eventTrackingRule: createTrackingRule("allow", ["cart-checked-out"]),
 *     async configure() {
 *         await revenueClient.connect();
 *     },
 *     trackEvent(event) {
 *         revenueClient.record(event.metadata);
 *     },
 *     trackProperty() {},
 * };
 * ```
 */
export interface TrackingAdapter {
    /**
     * Display name used in logs.
     * Defaults to the adapter's class name, or "adapter" for a plain object.
     */
    readonly name?: string;

    /**
     * Which event kinds this adapter receives. Omitted means all.
     */
    readonly eventTrackingRule?: TrackingRule;

    /**
     * Which property kinds this adapter receives. Omitted means all.
     */
    readonly propertyTrackingRule?: TrackingRule;

    /**
     * Prepare the adapter (load SDKs, open files, authenticate).
     * Runs on the hub's work queue before any delivery.
     */
    configure(): void | PromiseLike<void>;

    /**
     * Forget per-user state, e.g. on logout. Optional.
     */
    reset?(): void | PromiseLike<void>;

    /**
     * Receive one event that passed this adapter's event rule.
     */
    trackEvent(event: TrackableEvent): void | PromiseLike<void>;

    /**
     * Receive one property update that passed this adapter's property rule.
     */
    trackProperty(property: TrackableProperty): void | PromiseLike<void>;
}

/**
 * Adapter operations the hub invokes, used when reporting failures.
 */
export type AdapterOperation = "configure" | "reset" | "trackEvent" | "trackProperty";

/**
 * Name logged for an adapter that has neither a `name` nor a class of its own.
 */
export const DEFAULT_ADAPTER_NAME = "adapter";

/**
 * Resolve the display name of an adapter: its `name`, or its class name.
 * Plain objects and null-prototype objects fall back to `DEFAULT_ADAPTER_NAME`.
 */
export function adapterName(adapter: TrackingAdapter): string {
    if (adapter.name) {
        return adapter.name;
    }

    const prototype = Reflect.getPrototypeOf(adapter);
    const constructor: unknown = prototype === null ? undefined : prototype.constructor;
    if (typeof constructor !== "function" || constructor === Object || constructor.name === "") {
        return DEFAULT_ADAPTER_NAME;
    }
    return constructor.name;
}
