import { loadSyncEnv, playlistLimitSchema } from './env';
import { logger, setLogLevel } from './lib/logger';
import { openDatabase } from './lib/database';
import { resolveAccessToken } from './lib/spotify';
import { SpotifyCatalogSource } from './lib/spotify-catalog';
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from './lib/spotify-api';
import { runLibrarySync } from './services/library-sync';
import type { CatalogSource } from './types/catalog';

export interface CliOptions {
    limit?: number;
    backfillGenres: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
    const limitArg = argv.find((arg) => arg.startsWith('--limit='))?.slice('--limit='.length);

    let limit: number | undefined;
    if (limitArg !== undefined) {
        const parsed = playlistLimitSchema.safeParse(limitArg);
        if (!parsed.success) {
            throw new Error(`Invalid --limit value: ${limitArg}`);
        }
        limit = parsed.data;
    }

    return {
        limit,
        backfillGenres: argv.includes('--backfill-genres'),
    };
}

export type CatalogSourceFactory = (accessToken: string, retry: RetryOptions) => CatalogSource;

const createSpotifySource: CatalogSourceFactory = (accessToken, retry) =>
    new SpotifyCatalogSource(accessToken, retry);

async function runSync(
    argv: string[],
    envSource: NodeJS.ProcessEnv,
    createSource: CatalogSourceFactory
): Promise<void> {
    const cli = parseCliArgs(argv);
    const env = loadSyncEnv(envSource);
    setLogLevel(env.LOG_LEVEL);

    const accessToken = await resolveAccessToken(env);
    const source = createSource(accessToken, {
        ...DEFAULT_RETRY_OPTIONS,
        retries: env.SPOTIFY_MAX_RETRIES,
    });

    const db = openDatabase(env.DATABASE_PATH);
    try {
        const result = await runLibrarySync(db, source, {
            playlistLimit: cli.limit ?? env.PLAYLIST_LIMIT,
            backfillGenres: cli.backfillGenres,
        });
        logger.info(
            { database: env.DATABASE_PATH, playlists: result.playlists },
            'Spotify data saved'
        );
    } finally {
        db.close();
    }
}

// Never rejects: any failure is logged and turns into exit status 1
export async function main(
    argv: string[] = process.argv.slice(2),
    envSource: NodeJS.ProcessEnv = process.env,
    createSource: CatalogSourceFactory = createSpotifySource
): Promise<void> {
    try {
        await runSync(argv, envSource, createSource);
    } catch (error) {
        logger.fatal({ err: error }, error instanceof Error ? error.message : 'Library sync failed');
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}
