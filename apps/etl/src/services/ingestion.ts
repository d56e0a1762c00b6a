import type { LibraryDatabase } from '../lib/database';
import { IntegrityViolationError, isConstraintError } from '../lib/db-errors';
import { serviceLoggers } from '../lib/logger';
import {
    createLoadSummary,
    type AlbumRow,
    type ArtistRow,
    type EntityBatch,
    type EntityTable,
    type InsertStatus,
    type LoadSummary,
    type PlaylistRow,
    type PlaylistTrackRow,
    type TrackRow,
} from '../types/ingestion';

const log = serviceLoggers.ingestion;

type SqlValue = string | number | null;

// Insert-if-absent: a primary key conflict leaves the stored row as it is.
// Only uniqueness conflicts are ignored; foreign keys, NOT NULL and CHECK still fail.
const INSERT_SQL: Record<EntityTable, string> = {
    artists: `
        INSERT INTO artists (artist_id, name, genres)
        VALUES (@artistId, @name, @genres)
        ON CONFLICT (artist_id) DO NOTHING`,
    albums: `
        INSERT INTO albums (album_id, name, release_date, artist_id)
        VALUES (@albumId, @name, @releaseDate, @artistId)
        ON CONFLICT (album_id) DO NOTHING`,
    tracks: `
        INSERT INTO tracks (track_id, name, album_id, popularity, duration_ms, explicit)
        VALUES (@trackId, @name, @albumId, @popularity, @durationMs, @explicit)
        ON CONFLICT (track_id) DO NOTHING`,
    playlists: `
        INSERT INTO playlists (playlist_id, name, owner, num_tracks)
        VALUES (@playlistId, @name, @owner, @numTracks)
        ON CONFLICT (playlist_id) DO NOTHING`,
    playlist_tracks: `
        INSERT INTO playlist_tracks (playlist_id, track_id)
        VALUES (@playlistId, @trackId)
        ON CONFLICT (playlist_id, track_id) DO NOTHING`,
};

function insertRow(
    db: LibraryDatabase,
    table: EntityTable,
    key: string,
    params: Record<string, SqlValue>
): InsertStatus {
    try {
        const result = db.prepare<Record<string, SqlValue>>(INSERT_SQL[table]).run(params);
        return result.changes > 0 ? 'added' : 'skipped';
    } catch (error) {
        if (isConstraintError(error)) {
            throw new IntegrityViolationError(table, key, error.code, { cause: error });
        }
        throw error;
    }
}

export function insertArtist(db: LibraryDatabase, artist: ArtistRow): InsertStatus {
    return insertRow(db, 'artists', artist.artistId, {
        artistId: artist.artistId,
        name: artist.name,
        genres: artist.genres,
    });
}

export function insertAlbum(db: LibraryDatabase, album: AlbumRow): InsertStatus {
    return insertRow(db, 'albums', album.albumId, {
        albumId: album.albumId,
        name: album.name,
        releaseDate: album.releaseDate,
        artistId: album.artistId,
    });
}

// Track names are stored as received, null included
export function insertTrack(db: LibraryDatabase, track: TrackRow): InsertStatus {
    return insertRow(db, 'tracks', track.trackId, {
        trackId: track.trackId,
        name: track.name,
        albumId: track.albumId,
        popularity: track.popularity,
        durationMs: track.durationMs,
        explicit: track.explicit ? 1 : 0,
    });
}

export function insertPlaylist(db: LibraryDatabase, playlist: PlaylistRow): InsertStatus {
    return insertRow(db, 'playlists', playlist.playlistId, {
        playlistId: playlist.playlistId,
        name: playlist.name,
        owner: playlist.owner,
        numTracks: playlist.numTracks,
    });
}

export function insertPlaylistTrack(db: LibraryDatabase, entry: PlaylistTrackRow): InsertStatus {
    return insertRow(db, 'playlist_tracks', `${entry.playlistId}/${entry.trackId}`, {
        playlistId: entry.playlistId,
        trackId: entry.trackId,
    });
}

/**
 * Applies one batch in dependency order (artists, albums, tracks, playlists,
 * playlist_tracks) inside a single transaction. A constraint failure rolls the
 * whole batch back and rethrows as {@link IntegrityViolationError}.
 */
export function loadEntityBatch(db: LibraryDatabase, batch: EntityBatch): LoadSummary {
    const summary = createLoadSummary();

    const load = db.transaction(() => {
        for (const artist of batch.artists) {
            summary.artists[insertArtist(db, artist)]++;
        }
        for (const album of batch.albums) {
            summary.albums[insertAlbum(db, album)]++;
        }
        for (const track of batch.tracks) {
            summary.tracks[insertTrack(db, track)]++;
        }
        for (const playlist of batch.playlists) {
            summary.playlists[insertPlaylist(db, playlist)]++;
        }
        for (const entry of batch.playlistTracks) {
            summary.playlist_tracks[insertPlaylistTrack(db, entry)]++;
        }
    });

    load();

    log.debug({ summary }, 'Loaded entity batch');
    return summary;
}
