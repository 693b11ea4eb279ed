/**
 * Trackable Event Contract
 *
 * An event is a discrete occurrence reported by application code.
 * Every event carries a `kind` tag that names its event kind; tracking
 * rules match against that tag, never against the event's content.
 *
 * Events are immutable. The hub hands the same value to every adapter.
 */

/**
 * Structured event name: object + action + optional label.
 */
export interface EventIdentifier {
    /** What the event is about, e.g. "Checkout" */
    readonly object: string;

    /** What happened, e.g. "Completed" */
    readonly action: string;

    /** Optional qualifier, e.g. "Card" */
    readonly label?: string;
}

/**
 * Event metadata: string keys to arbitrary values.
 */
export type EventMetadata = Readonly<Record<string, unknown>>;

/**
 * Base shape of anything passed to `TrackingHub.track()`.
 *
 * @typeParam K - Kind tag; use a string literal union for compile-time checked kinds
 *
 * @example
 * ```typescript
 * type ShopEventKind = "product-viewed" | "cart-checked-out";
 *
 * const viewed: TrackableEvent<ShopEventKind> = createEvent(
 *     "product-viewed",
 *     createEventIdentifier("Product", "Viewed"),
 *     { sku: "SKU-1" },
 * );
 * ```
 */
export interface TrackableEvent<K extends string = string> {
    /** Kind tag used by tracking rules */
    readonly kind: K;

    /** Structured name of the event */
    readonly identifier: EventIdentifier;

    /** Event metadata (empty when the event has none) */
    readonly metadata: EventMetadata;
}

/**
 * Build an event identifier. An empty label is dropped.
 */
export function createEventIdentifier(object: string, action: string, label?: string): EventIdentifier {
    if (label) {
        return Object.freeze({ object, action, label });
    }
    return Object.freeze({ object, action });
}

/**
 * Render an identifier as `"Object: Action - Label"`, or `"Object: Action"`
 * when there is no label.
 */
export function formatEventIdentifier(identifier: EventIdentifier): string {
    if (identifier.label) {
        return `${identifier.object}: ${identifier.action} - ${identifier.label}`;
    }
    return `${identifier.object}: ${identifier.action}`;
}

/**
 * Factory for immutable events.
 *
 * The metadata is copied and frozen, so later changes to the caller's
 * object never reach adapters.
 *
 * @param kind - Kind tag
 * @param identifier - Structured event name
 * @param metadata - Optional metadata (defaults to `{}`)
 */
export function createEvent<K extends string>(
    kind: K,
    identifier: EventIdentifier,
    metadata: EventMetadata = {}
): TrackableEvent<K> {
    return Object.freeze({
        kind,
        identifier,
        metadata: Object.freeze({ ...metadata }),
    });
}
