/**
 * Trackable Property Contract
 *
 * A property is a named attribute of the current user or session
 * (email, plan, cart size). Updating a property may also emit
 * "update events" which the hub dispatches after the property itself.
 */

import type { TrackableEvent } from "./TrackableEvent.js";

/**
 * Values a property can carry. `null` means "no value".
 */
export type TrackableValue = string | number | boolean | null;

/**
 * Base shape of anything passed to `TrackingHub.update()`.
 *
 * @typeParam K - Kind tag matched by property tracking rules
 */
export interface TrackableProperty<K extends string = string> {
    /** Kind tag used by tracking rules */
    readonly kind: K;

    /** Property key as adapters should record it, e.g. "email" */
    readonly identifier: string;

    /** Current value */
    readonly trackedValue: TrackableValue;

    /**
     * Events to emit whenever this property is updated.
     * Omitted means none.
     */
    generateUpdateEvents?(): readonly TrackableEvent[];
}

/**
 * Read the update events of a property, `[]` when it declares none.
 */
export function getUpdateEvents(property: TrackableProperty): readonly TrackableEvent[] {
    return property.generateUpdateEvents?.() ?? [];
}

/**
 * Factory for immutable properties.
 *
 * @param kind - Kind tag
 * @param identifier - Property key
 * @param trackedValue - Current value
 * @param updateEvents - Events emitted on every update of this property
 *
 * @example
 * ```typescript
 * const email = createProperty("email", "email", "ada@example.test", [
 *     createEvent("email-changed", createEventIdentifier("Account", "Email Changed")),
 * ]);
 * ```
 */
export function createProperty<K extends string>(
    kind: K,
    identifier: string,
    trackedValue: TrackableValue,
    updateEvents: readonly TrackableEvent[] = []
): TrackableProperty<K> {
    const events = Object.freeze([...updateEvents]);

    return Object.freeze({
        kind,
        identifier,
        trackedValue,
        generateUpdateEvents: () => [...events],
    });
}
