// Boundary between the extraction pipeline and whatever supplies catalog data.
// The Spotify adapter implements it over HTTP; tests use an in-memory fake.

export interface PlaylistSummary {
    id: string;
    name: string;
    owner: string | null;
    totalTracks: number;
}

export interface TrackRef {
    id: string;
    name: string | null;
    albumId: string | null;
    popularity: number;
    durationMs: number;
    explicit: boolean;
}

export interface AlbumRecord {
    id: string;
    name: string;
    releaseDate: string | null;
    artistId: string | null;
}

export interface ArtistRecord {
    id: string;
    name: string;
    genres: string[];
}

/**
 * Each list call returns a fresh, finite sequence that pages from the start,
 * so a sequence can be iterated again by calling the method again.
 *
 * Any call may reject with a transient error (already retried by the adapter)
 * or a not-found error, which callers treat as "skip this entity".
 */
export interface CatalogSource {
    listUserPlaylists(limit: number): AsyncIterable<PlaylistSummary>;
    listPlaylistTracks(playlistId: string): AsyncIterable<TrackRef>;
    getAlbum(albumId: string): Promise<AlbumRecord>;
    getArtist(artistId: string): Promise<ArtistRecord>;
}
