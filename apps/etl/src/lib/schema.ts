import type { LibraryDatabase } from './database';
import { SchemaError } from './db-errors';
import { serviceLoggers } from './logger';

const log = serviceLoggers.schema;

export const LIBRARY_TABLES = ['artists', 'albums', 'tracks', 'playlists', 'playlist_tracks'] as const;

// Parents before children so each REFERENCES target already exists
const SCHEMA_STATEMENTS = [
    `
CREATE TABLE IF NOT EXISTS artists (
    artist_id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    genres TEXT
)`,
    `
CREATE TABLE IF NOT EXISTS albums (
    album_id TEXT PRIMARY KEY,
    name TEXT,
    release_date TEXT,
    artist_id TEXT NOT NULL,
    FOREIGN KEY (artist_id) REFERENCES artists(artist_id)
)`,
    `
CREATE TABLE IF NOT EXISTS tracks (
    track_id TEXT PRIMARY KEY,
    name TEXT,
    album_id TEXT NOT NULL,
    popularity INTEGER CHECK (popularity BETWEEN 0 AND 100),
    duration_ms INTEGER CHECK (duration_ms >= 0),
    explicit BOOLEAN,
    FOREIGN KEY (album_id) REFERENCES albums(album_id)
)`,
    `
CREATE TABLE IF NOT EXISTS playlists (
    playlist_id TEXT PRIMARY KEY,
    name TEXT,
    owner TEXT,
    num_tracks INTEGER
)`,
    `
CREATE TABLE IF NOT EXISTS playlist_tracks (
    playlist_id TEXT NOT NULL,
    track_id TEXT NOT NULL,
    PRIMARY KEY (playlist_id, track_id),
    FOREIGN KEY (playlist_id) REFERENCES playlists(playlist_id),
    FOREIGN KEY (track_id) REFERENCES tracks(track_id)
)`,
];

export function listTables(db: LibraryDatabase): string[] {
    const rows = db
        .prepare<[], { name: string }>(
            `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
        )
        .all();
    return rows.map((row) => row.name);
}

/**
 * Creates the five library tables when absent. Safe to call on every run:
 * existing tables and their rows are left untouched.
 *
 * @throws SchemaError when any statement fails; the whole DDL is rolled back.
 */
export function ensureSchema(db: LibraryDatabase): void {
    const applySchema = db.transaction(() => {
        for (const statement of SCHEMA_STATEMENTS) {
            db.exec(statement);
        }
    });

    try {
        applySchema();
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Failed to create library schema: ${reason}`, { cause: error });
    }

    const existing = new Set(listTables(db));
    const missing = LIBRARY_TABLES.filter((table) => !existing.has(table));
    if (missing.length > 0) {
        throw new SchemaError(`Library schema incomplete, missing tables: ${missing.join(', ')}`);
    }

    log.debug({ tables: LIBRARY_TABLES }, 'Library schema ready');
}
