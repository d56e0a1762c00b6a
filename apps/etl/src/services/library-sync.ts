import type { LibraryDatabase } from '../lib/database';
import { ensureSchema } from '../lib/schema';
import { serviceLoggers } from '../lib/logger';
import type { CatalogSource } from '../types/catalog';
import {
    createExtractionContext,
    createExtractionStats,
    createLoadSummary,
    mergeExtractionStats,
    mergeLoadSummaries,
    type ExtractionStats,
    type LoadSummary,
} from '../types/ingestion';
import { extractPlaylist } from './extraction';
import { loadEntityBatch } from './ingestion';
import { backfillMissingGenres } from './genre-backfill';

const log = serviceLoggers.sync;

// Matches the size of a typical library refresh rather than "every playlist ever"
export const DEFAULT_PLAYLIST_LIMIT = 30;

export interface LibrarySyncOptions {
    playlistLimit?: number;
    backfillGenres?: boolean;
}

export interface LibrarySyncResult {
    playlists: number;
    load: LoadSummary;
    extraction: ExtractionStats;
    // null when the backfill was not requested
    genresBackfilled: number | null;
}

/**
 * One full refresh: ensure the schema, then extract and load playlist by
 * playlist (each playlist commits on its own), then optionally backfill
 * missing genres. Rerunning over unchanged upstream data adds no rows.
 */
export async function runLibrarySync(
    db: LibraryDatabase,
    source: CatalogSource,
    options: LibrarySyncOptions = {}
): Promise<LibrarySyncResult> {
    const playlistLimit = options.playlistLimit ?? DEFAULT_PLAYLIST_LIMIT;

    ensureSchema(db);

    let context = createExtractionContext();
    let load = createLoadSummary();
    let extraction = createExtractionStats();
    let playlists = 0;

    log.info({ playlistLimit }, 'Starting library sync');

    for await (const playlist of source.listUserPlaylists(playlistLimit)) {
        const result = await extractPlaylist(source, playlist, context);
        context = result.context;

        const summary = loadEntityBatch(db, result.batch);
        load = mergeLoadSummaries(load, summary);
        extraction = mergeExtractionStats(extraction, result.stats);
        playlists++;

        log.info(
            {
                playlistId: playlist.id,
                name: playlist.name,
                tracks: result.batch.playlistTracks.length,
                tracksAdded: summary.tracks.added,
                progress: `${playlists}/${playlistLimit}`,
            },
            'Playlist synced'
        );
    }

    let genresBackfilled: number | null = null;
    if (options.backfillGenres) {
        genresBackfilled = backfillMissingGenres(db).updated;
    }

    log.info({ playlists, load, extraction, genresBackfilled }, 'Library sync complete');

    return { playlists, load, extraction, genresBackfilled };
}
