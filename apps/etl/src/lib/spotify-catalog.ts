import type { CatalogSource, PlaylistSummary, TrackRef, AlbumRecord, ArtistRecord } from '../types/catalog';
import {
    DEFAULT_RETRY_OPTIONS,
    PLAYLIST_PAGE_SIZE,
    getAlbum,
    getArtist,
    getCurrentUserPlaylists,
    getPlaylistTracks,
    type RetryOptions,
} from './spotify-api';
import { parseAlbum, parseArtist, parsePlaylist, parsePlaylistTrack } from './spotify-parser';

// CatalogSource backed by the Spotify Web API for the token's user
export class SpotifyCatalogSource implements CatalogSource {
    constructor(
        private readonly accessToken: string,
        private readonly retry: RetryOptions = DEFAULT_RETRY_OPTIONS
    ) {}

    async *listUserPlaylists(limit: number): AsyncIterable<PlaylistSummary> {
        if (limit <= 0) return;

        let yielded = 0;
        const pageSize = Math.min(limit, PLAYLIST_PAGE_SIZE);
        for await (const playlist of getCurrentUserPlaylists(this.accessToken, pageSize, this.retry)) {
            yield parsePlaylist(playlist);
            yielded++;
            if (yielded >= limit) return;
        }
    }

    async *listPlaylistTracks(playlistId: string): AsyncIterable<TrackRef> {
        for await (const item of getPlaylistTracks(this.accessToken, playlistId, this.retry)) {
            const track = parsePlaylistTrack(item);
            if (track) {
                yield track;
            }
        }
    }

    async getAlbum(albumId: string): Promise<AlbumRecord> {
        return parseAlbum(await getAlbum(this.accessToken, albumId, this.retry));
    }

    async getArtist(artistId: string): Promise<ArtistRecord> {
        return parseArtist(await getArtist(this.accessToken, artistId, this.retry));
    }
}
