import type {
    SpotifySimplifiedPlaylist,
    SpotifyPlaylistTrackItem,
    SpotifyFullAlbum,
    SpotifyFullArtist,
} from '../types/spotify';
import type { PlaylistSummary, TrackRef, AlbumRecord, ArtistRecord } from '../types/catalog';

export function parsePlaylist(playlist: SpotifySimplifiedPlaylist): PlaylistSummary {
    return {
        id: playlist.id,
        name: playlist.name,
        owner: playlist.owner.display_name ?? playlist.owner.id,
        totalTracks: playlist.tracks.total,
    };
}

// Null entries (removed tracks) and local files without an id carry nothing to store
export function parsePlaylistTrack(item: SpotifyPlaylistTrackItem): TrackRef | null {
    const track = item.track;
    if (!track || !track.id) {
        return null;
    }

    return {
        id: track.id,
        name: track.name,
        albumId: track.album?.id || null,
        popularity: track.popularity,
        durationMs: track.duration_ms,
        explicit: track.explicit,
    };
}

export function parseAlbum(album: SpotifyFullAlbum): AlbumRecord {
    return {
        id: album.id,
        name: album.name,
        releaseDate: album.release_date || null,
        artistId: album.artists[0]?.id || null,
    };
}

export function parseArtist(artist: SpotifyFullArtist): ArtistRecord {
    return {
        id: artist.id,
        name: artist.name,
        genres: artist.genres || [],
    };
}
