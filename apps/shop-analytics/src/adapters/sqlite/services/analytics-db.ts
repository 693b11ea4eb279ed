/**
 * Analytics SQLite Store
 *
 * Local store behind the SQLite tracking adapter. Events are appended,
 * properties are kept as one row per identifier holding the latest value.
 *
 * Pass ":memory:" as the path for a throwaway database.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { EventMetadata, TrackableValue } from "@trackhub/core";

const IN_MEMORY = ":memory:";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS events (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        kind       TEXT NOT NULL,
        identifier TEXT NOT NULL,
        metadata   TEXT NOT NULL,
        tracked_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_events_kind ON events (kind);

    CREATE TABLE IF NOT EXISTS properties (
        identifier TEXT PRIMARY KEY,
        kind       TEXT NOT NULL,
        value      TEXT NOT NULL,
        updated_at TEXT NOT NULL
    );
`;

/**
 * Raw event row from the database
 */
export interface EventRow {
    id: number;
    kind: string;
    identifier: string;
    metadata: string;
    tracked_at: string;
}

/**
 * Raw property row from the database
 */
export interface PropertyRow {
    identifier: string;
    kind: string;
    value: string;
    updated_at: string;
}

/**
 * Stored event for external use
 */
export interface StoredEvent {
    id: number;
    kind: string;
    identifier: string;
    metadata: Record<string, unknown>;
    trackedAt: Date;
}

/**
 * Stored property for external use
 */
export interface StoredProperty {
    identifier: string;
    kind: string;
    value: TrackableValue;
    updatedAt: Date;
}

/**
 * Analytics database
 */
export class AnalyticsDatabase {
    private db: Database.Database | null = null;
    private closed = false;

    constructor(private readonly dbPath: string) {}

    get path(): string {
        return this.dbPath;
    }

    get isOpen(): boolean {
        return this.db !== null;
    }

    /**
     * Open the database and create the tables.
     * Creates the parent directory of a file database.
     *
     * @throws Error if the database was closed
     */
    open(): void {
        if (this.closed) {
            throw new Error("Analytics database is closed");
        }
        if (this.db) {
            return;
        }

        if (this.dbPath !== IN_MEMORY) {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        const db = new Database(this.dbPath);
        db.exec(SCHEMA);
        this.db = db;
    }

    /**
     * Close the database connection. A closed database stays closed.
     */
    close(): void {
        this.closed = true;
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    insertEvent(kind: string, identifier: string, metadata: EventMetadata, trackedAt: Date): void {
        const db = this.ensureOpen();
        db.prepare<[string, string, string, string]>(`
            INSERT INTO events (kind, identifier, metadata, tracked_at)
            VALUES (?, ?, ?, ?)
        `).run(kind, identifier, JSON.stringify(metadata), trackedAt.toISOString());
    }

    /**
     * Insert or replace the value stored for a property identifier.
     */
    upsertProperty(kind: string, identifier: string, value: TrackableValue, updatedAt: Date): void {
        const db = this.ensureOpen();
        db.prepare<[string, string, string, string]>(`
            INSERT INTO properties (identifier, kind, value, updated_at)
            VALUES (?, ?, ?, ?)
            ON CONFLICT (identifier) DO UPDATE SET
                kind       = excluded.kind,
                value      = excluded.value,
                updated_at = excluded.updated_at
        `).run(identifier, kind, JSON.stringify(value), updatedAt.toISOString());
    }

    /**
     * Delete every stored property.
     *
     * @returns Number of rows deleted
     */
    deleteProperties(): number {
        const db = this.ensureOpen();
        return db.prepare("DELETE FROM properties").run().changes;
    }

    /**
     * Count stored events, optionally of one kind.
     */
    countEvents(kind?: string): number {
        const db = this.ensureOpen();

        const row = kind === undefined
            ? db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM events").get()
            : db.prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM events WHERE kind = ?").get(kind);

        return row?.count ?? 0;
    }

    /**
     * Read stored events, oldest first.
     */
    readEvents(limit: number = 100): StoredEvent[] {
        const db = this.ensureOpen();
        const rows = db.prepare<[number], EventRow>(`
            SELECT id, kind, identifier, metadata, tracked_at
            FROM events
            ORDER BY id ASC
            LIMIT ?
        `).all(limit);

        return rows.map((row) => ({
            id        : row.id,
            kind      : row.kind,
            identifier: row.identifier,
            metadata  : parseMetadata(row.metadata),
            trackedAt : new Date(row.tracked_at),
        }));
    }

    /**
     * Read every stored property, ordered by identifier.
     */
    readProperties(): StoredProperty[] {
        const db = this.ensureOpen();
        const rows = db.prepare<[], PropertyRow>(`
            SELECT identifier, kind, value, updated_at
            FROM properties
            ORDER BY identifier ASC
        `).all();

        return rows.map((row) => ({
            identifier: row.identifier,
            kind      : row.kind,
            value     : parseValue(row.value),
            updatedAt : new Date(row.updated_at),
        }));
    }

    private ensureOpen(): Database.Database {
        if (this.db) {
            return this.db;
        }
        throw new Error(this.closed ? "Analytics database is closed" : "Analytics database is not open");
    }
}

function parseValue(text: string): TrackableValue {
    const value: unknown = JSON.parse(text);
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        return value;
    }
    return String(value);
}

function parseMetadata(text: string): Record<string, unknown> {
    const value: unknown = JSON.parse(text);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        return Object.fromEntries(Object.entries(value));
    }
    return {};
}
