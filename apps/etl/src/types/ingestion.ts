// Row contracts for the five library tables

export interface ArtistRow {
    artistId: string;
    name: string;
    genres: string | null;
}

export interface AlbumRow {
    albumId: string;
    name: string;
    releaseDate: string | null;
    artistId: string;
}

export interface TrackRow {
    trackId: string;
    name: string | null;
    albumId: string;
    popularity: number;
    durationMs: number;
    explicit: boolean;
}

export interface PlaylistRow {
    playlistId: string;
    name: string;
    owner: string | null;
    numTracks: number;
}

export interface PlaylistTrackRow {
    playlistId: string;
    trackId: string;
}

// Entities in foreign-key order: every list only references rows from lists above it
export interface EntityBatch {
    artists: ArtistRow[];
    albums: AlbumRow[];
    tracks: TrackRow[];
    playlists: PlaylistRow[];
    playlistTracks: PlaylistTrackRow[];
}

export const ENTITY_TABLES = ['artists', 'albums', 'tracks', 'playlists', 'playlist_tracks'] as const;

export type EntityTable = (typeof ENTITY_TABLES)[number];

export type InsertStatus = 'added' | 'skipped';

export interface TableSummary {
    added: number;
    skipped: number;
}

export type LoadSummary = Record<EntityTable, TableSummary>;

export function createEmptyBatch(): EntityBatch {
    return {
        artists: [],
        albums: [],
        tracks: [],
        playlists: [],
        playlistTracks: [],
    };
}

export function createLoadSummary(): LoadSummary {
    return {
        artists: { added: 0, skipped: 0 },
        albums: { added: 0, skipped: 0 },
        tracks: { added: 0, skipped: 0 },
        playlists: { added: 0, skipped: 0 },
        playlist_tracks: { added: 0, skipped: 0 },
    };
}

export function mergeLoadSummaries(left: LoadSummary, right: LoadSummary): LoadSummary {
    const merged = createLoadSummary();
    for (const table of ENTITY_TABLES) {
        merged[table] = {
            added: left[table].added + right[table].added,
            skipped: left[table].skipped + right[table].skipped,
        };
    }
    return merged;
}

// Per run dedup state. Passed into each extraction stage and returned updated,
// never held at module level.
export interface ExtractionContext {
    readonly seenArtistIds: ReadonlySet<string>;
    readonly seenAlbumIds: ReadonlySet<string>;
    readonly seenTrackIds: ReadonlySet<string>;
    readonly unavailableArtistIds: ReadonlySet<string>;
    readonly unavailableAlbumIds: ReadonlySet<string>;
}

export function createExtractionContext(): ExtractionContext {
    return {
        seenArtistIds: new Set(),
        seenAlbumIds: new Set(),
        seenTrackIds: new Set(),
        unavailableArtistIds: new Set(),
        unavailableAlbumIds: new Set(),
    };
}

export interface ExtractionStats {
    tracksRead: number;
    tracksWithoutAlbum: number;
    tracksSkippedUnavailable: number;
    albumsFetched: number;
    artistsFetched: number;
    notFound: number;
}

export function createExtractionStats(): ExtractionStats {
    return {
        tracksRead: 0,
        tracksWithoutAlbum: 0,
        tracksSkippedUnavailable: 0,
        albumsFetched: 0,
        artistsFetched: 0,
        notFound: 0,
    };
}

export function mergeExtractionStats(left: ExtractionStats, right: ExtractionStats): ExtractionStats {
    return {
        tracksRead: left.tracksRead + right.tracksRead,
        tracksWithoutAlbum: left.tracksWithoutAlbum + right.tracksWithoutAlbum,
        tracksSkippedUnavailable: left.tracksSkippedUnavailable + right.tracksSkippedUnavailable,
        albumsFetched: left.albumsFetched + right.albumsFetched,
        artistsFetched: left.artistsFetched + right.artistsFetched,
        notFound: left.notFound + right.notFound,
    };
}
