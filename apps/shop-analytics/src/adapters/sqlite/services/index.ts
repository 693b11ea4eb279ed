/**
 * @fileoverview SQLite services barrel exports
 *
 * @module adapters/sqlite/services
 */

export {
    AnalyticsDatabase,
    type EventRow,
    type PropertyRow,
    type StoredEvent,
    type StoredProperty,
} from "./analytics-db.js";
