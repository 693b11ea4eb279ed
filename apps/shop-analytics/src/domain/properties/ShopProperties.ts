/**
 * @fileoverview Shop Properties
 *
 * Attributes of the current shopper. Updating the email also emits an
 * `email-changed` event, whatever the adapters' property rules say.
 *
 * @module domain/properties/ShopProperties
 */

import { createProperty, type TrackableProperty } from "@trackhub/core";
import { emailChanged } from "../events/ShopEvents.js";

/**
 * Property kinds known to the storefront.
 */
export const SHOP_PROPERTY_KINDS = ["email", "plan", "cart-size"] as const;

export type ShopPropertyKind = typeof SHOP_PROPERTY_KINDS[number];

export type ShopProperty = TrackableProperty<ShopPropertyKind>;

/**
 * Subscription plans.
 */
export type Plan = "free" | "pro" | "team";

/**
 * The shopper's email; `null` when cleared.
 *
 * @example
 * ```typescript
 * hub.update(emailProperty("ada@example.test"));
 * // delivers the property, then an "Account: Email Changed" event
 * ```
 */
export function emailProperty(email: string | null): ShopProperty {
    return createProperty("email", "email", email, [emailChanged(email)]);
}

export function planProperty(plan: Plan | null): ShopProperty {
    return createProperty("plan", "plan", plan);
}

/**
 * Number of items currently in the cart.
 */
export function cartSizeProperty(items: number): ShopProperty {
    return createProperty("cart-size", "cart_size", items);
}
