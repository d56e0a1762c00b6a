import { z } from 'zod';
import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env from project root
// This ensures env vars are present before validation
config({ path: resolve(__dirname, '../../../.env') });

// Blank lines in .env arrive as empty strings
const optionalString = z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().optional()
);

// Shared with the --limit flag
export const playlistLimitSchema = z.coerce.number().int().positive();

const storageEnvSchema = z.object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    DATABASE_PATH: z.string().min(1).default('spotify.db'),
});

const syncEnvSchema = storageEnvSchema
    .extend({
        PLAYLIST_LIMIT: playlistLimitSchema.default(30),
        SPOTIFY_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(5),
        SPOTIFY_ACCESS_TOKEN: optionalString,
        SPOTIFY_REFRESH_TOKEN: optionalString,
        SPOTIFY_CLIENT_ID: optionalString,
        SPOTIFY_CLIENT_SECRET: optionalString,
    })
    .superRefine((value, ctx) => {
        if (value.SPOTIFY_ACCESS_TOKEN) return;

        if (!value.SPOTIFY_REFRESH_TOKEN || !value.SPOTIFY_CLIENT_ID || !value.SPOTIFY_CLIENT_SECRET) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SPOTIFY_ACCESS_TOKEN'],
                message:
                    'Set SPOTIFY_ACCESS_TOKEN, or SPOTIFY_REFRESH_TOKEN together with SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET',
            });
        }
    });

export type StorageEnv = z.infer<typeof storageEnvSchema>;
export type SyncEnv = z.infer<typeof syncEnvSchema>;

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid environment variables:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

function toIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// Settings needed to open the database and log; enough for the query runner
export function loadStorageEnv(source: NodeJS.ProcessEnv = process.env): StorageEnv {
    const parsed = storageEnvSchema.safeParse(source);
    if (!parsed.success) {
        throw new ConfigError(toIssues(parsed.error));
    }
    return parsed.data;
}

// Full settings for an extraction run, including Spotify credentials
export function loadSyncEnv(source: NodeJS.ProcessEnv = process.env): SyncEnv {
    const parsed = syncEnvSchema.safeParse(source);
    if (!parsed.success) {
        throw new ConfigError(toIssues(parsed.error));
    }
    return parsed.data;
}
