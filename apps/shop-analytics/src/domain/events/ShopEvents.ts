/**
 * @fileoverview Shop Events
 *
 * Events tracked by the storefront. Each factory returns an immutable
 * event whose `kind` is what adapter rules in hub.yml refer to.
 *
 * @module domain/events/ShopEvents
 */

import { createEvent, createEventIdentifier, type TrackableEvent } from "@trackhub/core";

/**
 * Event kinds known to the storefront.
 */
export const SHOP_EVENT_KINDS = [
    "product-viewed",
    "cart-checked-out",
    "signed-up",
    "email-changed",
    "heartbeat",
] as const;

export type ShopEventKind = typeof SHOP_EVENT_KINDS[number];

export type ShopEvent = TrackableEvent<ShopEventKind>;

/**
 * A product page was opened.
 *
 * @example
 * ```typescript
 * hub.track(productViewed("SKU-1042", 19.99));
 * // identifier: "Product: Viewed - SKU-1042"
 * ```
 */
export function productViewed(sku: string, price: number): ShopEvent {
    return createEvent("product-viewed", createEventIdentifier("Product", "Viewed", sku), { sku, price });
}

/**
 * The cart was paid for.
 */
export function cartCheckedOut(total: number, currency: string, paymentMethod?: string): ShopEvent {
    return createEvent(
        "cart-checked-out",
        createEventIdentifier("Checkout", "Completed", paymentMethod),
        { total, currency }
    );
}

/**
 * A visitor created an account.
 */
export function signedUp(source: string): ShopEvent {
    return createEvent("signed-up", createEventIdentifier("Account", "Signed Up"), { source });
}

/**
 * The account email was set, changed or cleared.
 * Emitted as an update event of the email property.
 */
export function emailChanged(email: string | null): ShopEvent {
    return createEvent("email-changed", createEventIdentifier("Account", "Email Changed"), {
        cleared: email === null,
    });
}

/**
 * Periodic liveness ping.
 */
export function heartbeat(sequence: number): ShopEvent {
    return createEvent("heartbeat", createEventIdentifier("App", "Heartbeat"), { sequence });
}
