import type { AlbumRecord, CatalogSource, PlaylistSummary, TrackRef } from '../types/catalog';
import {
    createEmptyBatch,
    createExtractionStats,
    type EntityBatch,
    type ExtractionContext,
    type ExtractionStats,
} from '../types/ingestion';
import { isNotFoundError } from '../lib/spotify-errors';
import { serviceLoggers } from '../lib/logger';

const log = serviceLoggers.extraction;

export interface PlaylistExtraction {
    batch: EntityBatch;
    context: ExtractionContext;
    stats: ExtractionStats;
}

async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of sequence) {
        items.push(item);
    }
    return items;
}

/**
 * Reads one playlist and everything its tracks depend on, returning the rows
 * to insert and the updated run context.
 *
 * Albums and artists already seen in this run are not fetched again, and
 * tracks already emitted by an earlier playlist only add a membership row.
 * Not-found albums or artists are logged and skipped along with the tracks
 * that need them; every other upstream error propagates. Rows are keyed on the
 * id that was requested, which is the id the referencing rows carry.
 */
export async function extractPlaylist(
    source: CatalogSource,
    playlist: PlaylistSummary,
    context: ExtractionContext
): Promise<PlaylistExtraction> {
    const seenArtistIds = new Set(context.seenArtistIds);
    const seenAlbumIds = new Set(context.seenAlbumIds);
    const seenTrackIds = new Set(context.seenTrackIds);
    const unavailableArtistIds = new Set(context.unavailableArtistIds);
    const unavailableAlbumIds = new Set(context.unavailableAlbumIds);

    const batch = createEmptyBatch();
    const stats = createExtractionStats();
    const playlistLog = log.child({ playlistId: playlist.id });

    batch.playlists.push({
        playlistId: playlist.id,
        name: playlist.name,
        owner: playlist.owner,
        numTracks: playlist.totalTracks,
    });

    async function resolveArtist(artistId: string): Promise<boolean> {
        if (seenArtistIds.has(artistId)) return true;
        if (unavailableArtistIds.has(artistId)) return false;

        try {
            const artist = await source.getArtist(artistId);
            stats.artistsFetched++;
            batch.artists.push({
                artistId,
                name: artist.name,
                genres: artist.genres.join(','),
            });
            seenArtistIds.add(artistId);
            return true;
        } catch (error) {
            if (!isNotFoundError(error)) throw error;
            stats.notFound++;
            unavailableArtistIds.add(artistId);
            playlistLog.warn({ artistId }, 'Artist not found upstream, skipping');
            return false;
        }
    }

    async function resolveAlbum(albumId: string): Promise<boolean> {
        if (seenAlbumIds.has(albumId)) return true;
        if (unavailableAlbumIds.has(albumId)) return false;

        let album: AlbumRecord;
        try {
            album = await source.getAlbum(albumId);
            stats.albumsFetched++;
        } catch (error) {
            if (!isNotFoundError(error)) throw error;
            stats.notFound++;
            unavailableAlbumIds.add(albumId);
            playlistLog.warn({ albumId }, 'Album not found upstream, skipping');
            return false;
        }

        if (!album.artistId) {
            unavailableAlbumIds.add(albumId);
            playlistLog.warn({ albumId }, 'Album has no artist, skipping');
            return false;
        }

        if (!(await resolveArtist(album.artistId))) {
            unavailableAlbumIds.add(albumId);
            return false;
        }

        batch.albums.push({
            albumId,
            name: album.name,
            releaseDate: album.releaseDate,
            artistId: album.artistId,
        });
        seenAlbumIds.add(albumId);
        return true;
    }

    let tracks: TrackRef[] = [];
    try {
        tracks = await collect(source.listPlaylistTracks(playlist.id));
    } catch (error) {
        if (!isNotFoundError(error)) throw error;
        stats.notFound++;
        playlistLog.warn('Playlist tracks not found upstream, storing playlist without tracks');
    }

    const members = new Set<string>();
    for (const track of tracks) {
        stats.tracksRead++;

        if (!track.albumId) {
            stats.tracksWithoutAlbum++;
            playlistLog.warn({ trackId: track.id }, 'Track has no album, skipping');
            continue;
        }

        if (!(await resolveAlbum(track.albumId))) {
            stats.tracksSkippedUnavailable++;
            continue;
        }

        if (!seenTrackIds.has(track.id)) {
            batch.tracks.push({
                trackId: track.id,
                name: track.name,
                albumId: track.albumId,
                popularity: track.popularity,
                durationMs: track.durationMs,
                explicit: track.explicit,
            });
            seenTrackIds.add(track.id);
        }

        if (!members.has(track.id)) {
            batch.playlistTracks.push({ playlistId: playlist.id, trackId: track.id });
            members.add(track.id);
        }
    }

    return {
        batch,
        context: {
            seenArtistIds,
            seenAlbumIds,
            seenTrackIds,
            unavailableArtistIds,
            unavailableAlbumIds,
        },
        stats,
    };
}
