import pino from 'pino';

// Until the environment is validated, the raw LOG_LEVEL only sets the initial level
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'library-etl' },
    timestamp: pino.stdTimeFunctions.isoTime,
});

export const serviceLoggers = {
    schema: logger.child({ module: 'Schema' }),
    spotify: logger.child({ module: 'SpotifyApi' }),
    extraction: logger.child({ module: 'Extraction' }),
    ingestion: logger.child({ module: 'Ingestion' }),
    backfill: logger.child({ module: 'GenreBackfill' }),
    sync: logger.child({ module: 'LibrarySync' }),
};

// Children keep the level they were created with, so each one is updated too
export function setLogLevel(level: pino.LevelWithSilent): void {
    logger.level = level;
    for (const child of Object.values(serviceLoggers)) {
        child.level = level;
    }
}
