/**
 * @fileoverview Adapter wiring barrel exports
 *
 * @module adapters
 */

export { createAdapters, closeAdapters, type CreateAdaptersOptions } from "./createAdapters.js";
