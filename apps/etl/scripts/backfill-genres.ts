/**
 * Replaces missing artist genres with the "Unknown Genre" sentinel and
 * confirms none are left. Safe to rerun.
 * Run with: npm run backfill-genres
 */
import { loadStorageEnv } from '../src/env';
import { setLogLevel } from '../src/lib/logger';
import { openDatabase } from '../src/lib/database';
import { ensureSchema } from '../src/lib/schema';
import { backfillMissingGenres, countMissingGenres } from '../src/services/genre-backfill';

function main() {
    const env = loadStorageEnv();
    setLogLevel(env.LOG_LEVEL);
    const db = openDatabase(env.DATABASE_PATH);

    try {
        ensureSchema(db);
        console.log(`Artists missing genres: ${countMissingGenres(db)}`);

        const result = backfillMissingGenres(db);
        console.log(`Updated: ${result.updated}`);
        console.log(`Still missing: ${result.remaining}`);

        if (result.remaining > 0) {
            process.exitCode = 1;
        }
    } finally {
        db.close();
    }
}

try {
    main();
} catch (error) {
    console.error('Genre backfill failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
}
