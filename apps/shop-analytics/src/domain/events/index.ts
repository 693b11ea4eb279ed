/**
 * @fileoverview Events barrel exports
 *
 * @module domain/events
 */

export {
    SHOP_EVENT_KINDS,
    productViewed,
    cartCheckedOut,
    signedUp,
    emailChanged,
    heartbeat,
    type ShopEvent,
    type ShopEventKind,
} from "./ShopEvents.js";
