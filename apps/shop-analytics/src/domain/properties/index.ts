/**
 * @fileoverview Properties barrel exports
 *
 * @module domain/properties
 */

export {
    SHOP_PROPERTY_KINDS,
    emailProperty,
    planProperty,
    cartSizeProperty,
    type Plan,
    type ShopProperty,
    type ShopPropertyKind,
} from "./ShopProperties.js";
