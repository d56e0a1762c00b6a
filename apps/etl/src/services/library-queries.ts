import type { LibraryDatabase } from '../lib/database';

export class MutatingQueryError extends Error {
    constructor(public readonly queryName: string) {
        super(`Query "${queryName}" is not read-only`);
        this.name = 'MutatingQueryError';
    }
}

export interface PlaylistTrackCount {
    playlist_name: string;
    num_tracks: number;
}

export interface PopularTrack {
    track_name: string | null;
    artist_name: string;
    popularity: number;
}

export type PopularityLevel = '🔥 Superstar' | '⭐ Rising Artist' | '🌱 Underrated Gem';

export interface ArtistPopularityTier {
    artist_name: string;
    avg_popularity: number;
    popularity_level: PopularityLevel;
}

export interface PlaylistDiversity {
    playlist_name: string;
    unique_artists: number;
    total_tracks: number;
    // null when the playlist has no stored tracks
    diversity_percent: number | null;
}

export interface PlaylistDuration {
    playlist_name: string;
    avg_duration_min: number;
}

export interface PlaylistExplicitShare {
    playlist_name: string;
    explicit_count: number;
    total_tracks: number;
    explicit_percent: number;
}

export interface FeaturedArtist {
    artist_name: string;
    playlist_count: number;
}

export interface ArtistRank {
    artist_name: string;
    avg_popularity: number;
    rank_position: number;
}

export interface AlbumRelease {
    artist_name: string;
    album_name: string;
    release_date: string;
    previous_release: string;
}

export interface PlaylistSizeCategory {
    playlist_name: string;
    num_tracks: number;
    category: 'Short Playlist' | 'Large Playlist';
}

export interface AlbumReleaseYear {
    album_name: string;
    release_year: string | null;
}

export interface TrackPlaylistCount {
    track_name: string;
    artist_name: string;
    playlist_count: number;
}

export interface UnnamedTrack {
    track_id: string;
    album_id: string;
    popularity: number;
    duration_ms: number;
    explicit: number;
}

export interface MissingGenreCount {
    missing_genres: number;
}

// Refuses anything SQLite would not execute as a pure read
export function runReadOnly<Row>(db: LibraryDatabase, name: string, sql: string): Row[] {
    const statement = db.prepare<[], Row>(sql);
    if (!statement.readonly) {
        throw new MutatingQueryError(name);
    }
    return statement.all();
}

const ARTIST_AVERAGE_POPULARITY = `
    SELECT
        ar.artist_id,
        ar.name AS artist_name,
        AVG(t.popularity) AS avg_raw
    FROM artists ar
    JOIN albums al ON ar.artist_id = al.artist_id
    JOIN tracks t ON al.album_id = t.album_id
    GROUP BY ar.artist_id, ar.name`;

export function getTracksPerPlaylist(db: LibraryDatabase): PlaylistTrackCount[] {
    return runReadOnly<PlaylistTrackCount>(db, 'tracksPerPlaylist', `
        SELECT
            name AS playlist_name,
            num_tracks
        FROM playlists
        ORDER BY num_tracks DESC, name ASC`);
}

export function getTopTracksByPopularity(db: LibraryDatabase): PopularTrack[] {
    return runReadOnly<PopularTrack>(db, 'topTracksByPopularity', `
        SELECT
            t.name AS track_name,
            ar.name AS artist_name,
            t.popularity
        FROM tracks t
        JOIN albums al ON t.album_id = al.album_id
        JOIN artists ar ON al.artist_id = ar.artist_id
        ORDER BY t.popularity DESC, t.track_id ASC
        LIMIT 10`);
}

// Fifteen least popular artists with a tier label (>= 80, >= 60, below)
export function getArtistPopularityTiers(db: LibraryDatabase): ArtistPopularityTier[] {
    return runReadOnly<ArtistPopularityTier>(db, 'artistPopularityTiers', `
        WITH artist_popularity AS (${ARTIST_AVERAGE_POPULARITY})
        SELECT
            artist_name,
            ROUND(avg_raw, 1) AS avg_popularity,
            CASE
                WHEN avg_raw >= 80 THEN '🔥 Superstar'
                WHEN avg_raw >= 60 THEN '⭐ Rising Artist'
                ELSE '🌱 Underrated Gem'
            END AS popularity_level
        FROM artist_popularity
        ORDER BY avg_raw ASC, artist_name ASC
        LIMIT 15`);
}

export function getPlaylistArtistDiversity(db: LibraryDatabase): PlaylistDiversity[] {
    return runReadOnly<PlaylistDiversity>(db, 'playlistArtistDiversity', `
        SELECT
            p.name AS playlist_name,
            COUNT(DISTINCT al.artist_id) AS unique_artists,
            COUNT(pt.track_id) AS total_tracks,
            ROUND(
                CAST(COUNT(DISTINCT al.artist_id) AS REAL) / NULLIF(COUNT(pt.track_id), 0) * 100,
                1
            ) AS diversity_percent
        FROM playlists p
        LEFT JOIN playlist_tracks pt ON p.playlist_id = pt.playlist_id
        LEFT JOIN tracks t ON pt.track_id = t.track_id
        LEFT JOIN albums al ON t.album_id = al.album_id
        GROUP BY p.playlist_id, p.name
        ORDER BY diversity_percent DESC, p.name ASC
        LIMIT 10`);
}

export function getAverageDurationByPlaylist(db: LibraryDatabase): PlaylistDuration[] {
    return runReadOnly<PlaylistDuration>(db, 'averageDurationByPlaylist', `
        SELECT
            p.name AS playlist_name,
            ROUND(AVG(t.duration_ms) / 60000.0, 1) AS avg_duration_min
        FROM playlists p
        JOIN playlist_tracks pt ON p.playlist_id = pt.playlist_id
        JOIN tracks t ON pt.track_id = t.track_id
        GROUP BY p.playlist_id, p.name
        ORDER BY avg_duration_min DESC, p.name ASC`);
}

export function getExplicitContentByPlaylist(db: LibraryDatabase): PlaylistExplicitShare[] {
    return runReadOnly<PlaylistExplicitShare>(db, 'explicitContentByPlaylist', `
        SELECT
            p.name AS playlist_name,
            SUM(CASE WHEN t.explicit = 1 THEN 1 ELSE 0 END) AS explicit_count,
            COUNT(*) AS total_tracks,
            ROUND(SUM(CASE WHEN t.explicit = 1 THEN 1 ELSE 0 END) * 100.0 / COUNT(*), 1) AS explicit_percent
        FROM playlists p
        JOIN playlist_tracks pt ON p.playlist_id = pt.playlist_id
        JOIN tracks t ON pt.track_id = t.track_id
        GROUP BY p.playlist_id, p.name
        ORDER BY explicit_percent DESC, p.name ASC`);
}

export function getMostFeaturedArtists(db: LibraryDatabase): FeaturedArtist[] {
    return runReadOnly<FeaturedArtist>(db, 'mostFeaturedArtists', `
        SELECT
            ar.name AS artist_name,
            COUNT(DISTINCT pt.playlist_id) AS playlist_count
        FROM artists ar
        JOIN albums al ON ar.artist_id = al.artist_id
        JOIN tracks t ON al.album_id = t.album_id
        JOIN playlist_tracks pt ON t.track_id = pt.track_id
        GROUP BY ar.artist_id, ar.name
        ORDER BY playlist_count DESC, artist_name ASC
        LIMIT 10`);
}

// Ties share a position and the next position follows without gaps
export function getArtistPopularityRanking(db: LibraryDatabase): ArtistRank[] {
    return runReadOnly<ArtistRank>(db, 'artistPopularityRanking', `
        WITH artist_popularity AS (${ARTIST_AVERAGE_POPULARITY})
        SELECT
            artist_name,
            ROUND(avg_raw, 1) AS avg_popularity,
            DENSE_RANK() OVER (ORDER BY avg_raw DESC) AS rank_position
        FROM artist_popularity
        ORDER BY rank_position ASC, artist_name ASC
        LIMIT 10`);
}

// Each album next to the same artist's previous release; first releases are dropped
export function getAlbumReleaseSequence(db: LibraryDatabase): AlbumRelease[] {
    return runReadOnly<AlbumRelease>(db, 'albumReleaseSequence', `
        WITH ordered_albums AS (
            SELECT
                ar.name AS artist_name,
                al.name AS album_name,
                al.release_date,
                LAG(al.release_date) OVER (
                    PARTITION BY ar.artist_id
                    ORDER BY al.release_date, al.album_id
                ) AS previous_release
            FROM albums al
            JOIN artists ar ON al.artist_id = ar.artist_id
        )
        SELECT *
        FROM ordered_albums
        WHERE previous_release IS NOT NULL
        ORDER BY artist_name ASC, release_date ASC
        LIMIT 10`);
}

export function getPlaylistSizeCategories(db: LibraryDatabase): PlaylistSizeCategory[] {
    return runReadOnly<PlaylistSizeCategory>(db, 'playlistSizeCategories', `
        SELECT name AS playlist_name, num_tracks, 'Short Playlist' AS category
        FROM playlists
        WHERE num_tracks < 20
        UNION
        SELECT name AS playlist_name, num_tracks, 'Large Playlist' AS category
        FROM playlists
        WHERE num_tracks >= 20
        ORDER BY num_tracks ASC, playlist_name ASC`);
}

export function getAlbumReleaseYears(db: LibraryDatabase): AlbumReleaseYear[] {
    return runReadOnly<AlbumReleaseYear>(db, 'albumReleaseYears', `
        SELECT
            name AS album_name,
            SUBSTR(release_date, 1, 4) AS release_year
        FROM albums
        ORDER BY release_year DESC, album_name ASC
        LIMIT 10`);
}

// Null names are stored as-is and only replaced here, for display
export function getTrackPlaylistCounts(db: LibraryDatabase): TrackPlaylistCount[] {
    return runReadOnly<TrackPlaylistCount>(db, 'trackPlaylistCounts', `
        SELECT
            COALESCE(t.name, 'Unknown Track') AS track_name,
            ar.name AS artist_name,
            COUNT(pt.playlist_id) AS playlist_count
        FROM tracks t
        JOIN albums al ON t.album_id = al.album_id
        JOIN artists ar ON al.artist_id = ar.artist_id
        LEFT JOIN playlist_tracks pt ON t.track_id = pt.track_id
        GROUP BY t.track_id, t.name, ar.name
        ORDER BY playlist_count DESC, track_name ASC
        LIMIT 15`);
}

export function getUnnamedTracks(db: LibraryDatabase): UnnamedTrack[] {
    return runReadOnly<UnnamedTrack>(db, 'unnamedTracks', `
        SELECT track_id, album_id, popularity, duration_ms, explicit
        FROM tracks
        WHERE name IS NULL
        ORDER BY track_id ASC`);
}

export function getMissingGenreCount(db: LibraryDatabase): MissingGenreCount[] {
    return runReadOnly<MissingGenreCount>(db, 'missingGenreCount', `
        SELECT COUNT(*) AS missing_genres
        FROM artists
        WHERE genres IS NULL OR genres = ''`);
}

export interface LibraryQuery {
    description: string;
    run: (db: LibraryDatabase) => object[];
}

export const LIBRARY_QUERIES = {
    tracksPerPlaylist: {
        description: 'Total tracks by playlist',
        run: getTracksPerPlaylist,
    },
    topTracksByPopularity: {
        description: 'Most popular saved tracks',
        run: getTopTracksByPopularity,
    },
    artistPopularityTiers: {
        description: 'Average artist popularity with tier label',
        run: getArtistPopularityTiers,
    },
    playlistArtistDiversity: {
        description: 'Playlists with the most diverse range of artists',
        run: getPlaylistArtistDiversity,
    },
    averageDurationByPlaylist: {
        description: 'Average track duration (minutes) by playlist',
        run: getAverageDurationByPlaylist,
    },
    explicitContentByPlaylist: {
        description: 'Share of explicit tracks by playlist',
        run: getExplicitContentByPlaylist,
    },
    mostFeaturedArtists: {
        description: 'Artists appearing in the most playlists',
        run: getMostFeaturedArtists,
    },
    artistPopularityRanking: {
        description: 'Artists ranked by average track popularity',
        run: getArtistPopularityRanking,
    },
    albumReleaseSequence: {
        description: 'Albums with the same artist\'s previous release date',
        run: getAlbumReleaseSequence,
    },
    playlistSizeCategories: {
        description: 'Short and large playlists',
        run: getPlaylistSizeCategories,
    },
    albumReleaseYears: {
        description: 'Most recent album release years',
        run: getAlbumReleaseYears,
    },
    trackPlaylistCounts: {
        description: 'Playlist count per track, unnamed tracks shown as "Unknown Track"',
        run: getTrackPlaylistCounts,
    },
    unnamedTracks: {
        description: 'Tracks stored without a name',
        run: getUnnamedTracks,
    },
    missingGenreCount: {
        description: 'Artists still missing genres',
        run: getMissingGenreCount,
    },
} satisfies Record<string, LibraryQuery>;

export type LibraryQueryName = keyof typeof LIBRARY_QUERIES;

export function isLibraryQueryName(name: string): name is LibraryQueryName {
    return Object.prototype.hasOwnProperty.call(LIBRARY_QUERIES, name);
}
