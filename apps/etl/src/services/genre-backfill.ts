import type { LibraryDatabase } from '../lib/database';
import { serviceLoggers } from '../lib/logger';

const log = serviceLoggers.backfill;

export const UNKNOWN_GENRE = 'Unknown Genre';

const MISSING_GENRES_PREDICATE = `genres IS NULL OR genres = ''`;

export interface GenreBackfillResult {
    updated: number;
    remaining: number;
}

// Verification query: zero once the backfill has run
export function countMissingGenres(db: LibraryDatabase): number {
    const row = db
        .prepare<[], { missing_genres: number }>(
            `SELECT COUNT(*) AS missing_genres FROM artists WHERE ${MISSING_GENRES_PREDICATE}`
        )
        .get();
    return row?.missing_genres ?? 0;
}

// Replaces null or empty genres with the sentinel. Rerunning updates nothing.
export function backfillMissingGenres(db: LibraryDatabase): GenreBackfillResult {
    const result = db
        .prepare<[string]>(`UPDATE artists SET genres = ? WHERE ${MISSING_GENRES_PREDICATE}`)
        .run(UNKNOWN_GENRE);

    const remaining = countMissingGenres(db);
    if (remaining > 0) {
        log.error({ remaining }, 'Artists still missing genres after backfill');
    } else {
        log.info({ updated: result.changes }, 'Backfilled missing artist genres');
    }

    return { updated: result.changes, remaining };
}
