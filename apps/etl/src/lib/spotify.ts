import type { SpotifyTokenResponse } from '../types/spotify';
import type { SyncEnv } from '../env';

const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

// Custom error for token refresh failures
export class TokenRefreshError extends Error {
    constructor(
        message: string,
        public readonly isRevoked: boolean,
        public readonly spotifyError?: string
    ) {
        super(message);
        this.name = 'TokenRefreshError';
    }
}

export interface ClientCredentials {
    clientId: string;
    clientSecret: string;
}

// Refresh access token using refresh token. The token must carry the
// user-library-read and playlist-read-private scopes.
export async function refreshAccessToken(
    credentials: ClientCredentials,
    refreshToken: string
): Promise<SpotifyTokenResponse> {
    const { clientId, clientSecret } = credentials;

    const params = new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
    });

    const response = await fetch(SPOTIFY_TOKEN_URL, {
        method: 'POST',
        headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
        },
        body: params.toString(),
    });

    if (!response.ok) {
        const errorText = await response.text();
        let errorBody: { error?: string; error_description?: string } = {};
        try {
            errorBody = JSON.parse(errorText);
        } catch {
            // Not JSON, use raw text
        }

        const isRevoked = errorBody.error === 'invalid_grant';
        throw new TokenRefreshError(
            `Token refresh failed: ${errorBody.error_description || errorText}`,
            isRevoked,
            errorBody.error
        );
    }

    return response.json() as Promise<SpotifyTokenResponse>;
}

// A preissued token wins; otherwise trade the refresh token for a fresh one
export async function resolveAccessToken(
    env: Pick<SyncEnv, 'SPOTIFY_ACCESS_TOKEN' | 'SPOTIFY_REFRESH_TOKEN' | 'SPOTIFY_CLIENT_ID' | 'SPOTIFY_CLIENT_SECRET'>
): Promise<string> {
    if (env.SPOTIFY_ACCESS_TOKEN) {
        return env.SPOTIFY_ACCESS_TOKEN;
    }

    if (!env.SPOTIFY_REFRESH_TOKEN || !env.SPOTIFY_CLIENT_ID || !env.SPOTIFY_CLIENT_SECRET) {
        throw new TokenRefreshError('Missing Spotify credentials for token refresh', false);
    }

    const tokens = await refreshAccessToken(
        { clientId: env.SPOTIFY_CLIENT_ID, clientSecret: env.SPOTIFY_CLIENT_SECRET },
        env.SPOTIFY_REFRESH_TOKEN
    );
    return tokens.access_token;
}
