/**
 * @fileoverview Domain barrel exports
 *
 * Events, properties and adapters of the storefront.
 *
 * @module domain
 */

export * from "./events/index.js";
export * from "./properties/index.js";
export * from "./adapters/index.js";
