// Response shapes for the Web API endpoints the extractor reads.
// Only the fields we persist are declared.

export interface SpotifyPage<T> {
    href: string;
    items: T[];
    limit: number;
    next: string | null;
    offset: number;
    total: number;
}

export interface SpotifySimplifiedArtist {
    id: string;
    name: string;
}

export interface SpotifySimplifiedAlbum {
    id: string | null;
    name: string;
    release_date: string | null;
    artists: SpotifySimplifiedArtist[];
}

export interface SpotifyTrack {
    id: string | null;
    name: string | null;
    popularity: number;
    duration_ms: number;
    explicit: boolean;
    is_local?: boolean;
    album: SpotifySimplifiedAlbum | null;
    artists: SpotifySimplifiedArtist[];
}

export interface SpotifyPlaylistTrackItem {
    added_at: string | null;
    // null for tracks removed from the catalog
    track: SpotifyTrack | null;
}

export interface SpotifySimplifiedPlaylist {
    id: string;
    name: string;
    owner: {
        id: string;
        display_name: string | null;
    };
    tracks: {
        href: string;
        total: number;
    };
}

export interface SpotifyFullAlbum extends SpotifySimplifiedAlbum {
    id: string;
    album_type: string;
    total_tracks: number;
}

export interface SpotifyFullArtist extends SpotifySimplifiedArtist {
    genres: string[];
    popularity: number;
}

export interface SpotifyTokenResponse {
    access_token: string;
    token_type: string;
    scope: string;
    expires_in: number;
    refresh_token?: string;
}
