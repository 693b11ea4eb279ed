/**
 * @fileoverview Adapters barrel exports
 *
 * @module domain/adapters
 */

export { ConsoleAdapter, type ConsoleAdapterConfig } from "./ConsoleAdapter.js";
export { JsonlFileAdapter, type JsonlFileAdapterConfig, type JsonlRecord } from "./JsonlFileAdapter.js";
export { SqliteAdapter, type SqliteAdapterConfig } from "./SqliteAdapter.js";
