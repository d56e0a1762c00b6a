import pRetry from 'p-retry';
import type {
    SpotifyPage,
    SpotifySimplifiedPlaylist,
    SpotifyPlaylistTrackItem,
    SpotifyFullAlbum,
    SpotifyFullArtist,
} from '../types/spotify';
import {
    SpotifyApiError,
    SpotifyUnauthenticatedError,
    SpotifyForbiddenError,
    SpotifyNotFoundError,
    SpotifyRateLimitError,
    SpotifyDownError,
    SpotifyNetworkError,
    isRetryableError,
} from './spotify-errors';
import { serviceLoggers } from './logger';

const log = serviceLoggers.spotify;

export const SPOTIFY_API_URL = 'https://api.spotify.com/v1';

// Maximum page sizes the endpoints accept
export const PLAYLIST_PAGE_SIZE = 50;
export const PLAYLIST_TRACKS_PAGE_SIZE = 100;

export interface RetryOptions {
    retries: number;     // attempts after the first one
    minTimeoutMs: number; // delay before the first retry
    factor: number;      // exponential growth between retries
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    retries: 5,
    minTimeoutMs: 1000,
    factor: 2,
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Handle API response and throw appropriate errors
async function handleResponse<T>(response: Response, url: string): Promise<T> {
    if (response.ok) {
        return response.json() as Promise<T>;
    }

    if (response.status === 401) {
        throw new SpotifyUnauthenticatedError();
    }

    if (response.status === 403) {
        throw new SpotifyForbiddenError();
    }

    if (response.status === 404) {
        throw new SpotifyNotFoundError(new URL(url).pathname);
    }

    if (response.status === 429) {
        const retryAfter = parseInt(response.headers.get('Retry-After') || '1', 10);
        throw new SpotifyRateLimitError(Number.isNaN(retryAfter) ? 1 : retryAfter);
    }

    if (response.status >= 500) {
        throw new SpotifyDownError(response.status);
    }

    // Other errors
    const errorText = await response.text();
    throw new SpotifyApiError(`Spotify API error: ${errorText}`, response.status, false);
}

// GET with bounded exponential backoff on transient failures. Rate limited
// attempts also wait out Retry-After. The last error surfaces once retries run out.
export async function fetchWithRetry<T>(
    url: string,
    accessToken: string,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<T> {
    return pRetry(
        async () => {
            let response: Response;
            try {
                response = await fetch(url, {
                    headers: { Authorization: `Bearer ${accessToken}` },
                });
            } catch (error) {
                throw new SpotifyNetworkError(
                    error instanceof Error ? error.message : 'fetch failed',
                    { cause: error }
                );
            }
            return handleResponse<T>(response, url);
        },
        {
            retries: retry.retries,
            minTimeout: retry.minTimeoutMs,
            factor: retry.factor,
            onFailedAttempt: async (error) => {
                if (!isRetryableError(error)) {
                    throw error;
                }
                log.warn(
                    { url, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, reason: error.message },
                    'Spotify request failed, retrying'
                );
                if (error instanceof SpotifyRateLimitError && error.retriesLeft > 0) {
                    await sleep(error.retryAfterSeconds * 1000);
                }
            },
        }
    );
}

// Walk a paging object from its first URL, following `next` until exhausted.
// Every call starts over from the first page.
export async function* paginate<T>(
    firstUrl: string,
    accessToken: string,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): AsyncGenerator<T, void, undefined> {
    let url: string | null = firstUrl;

    while (url) {
        const page: SpotifyPage<T> = await fetchWithRetry<SpotifyPage<T>>(url, accessToken, retry);
        yield* page.items;
        url = page.next;
    }
}

export function currentUserPlaylistsUrl(pageSize: number = PLAYLIST_PAGE_SIZE): string {
    const params = new URLSearchParams({ limit: String(Math.min(pageSize, PLAYLIST_PAGE_SIZE)) });
    return `${SPOTIFY_API_URL}/me/playlists?${params.toString()}`;
}

export function playlistTracksUrl(playlistId: string): string {
    const params = new URLSearchParams({
        limit: String(PLAYLIST_TRACKS_PAGE_SIZE),
        additional_types: 'track',
    });
    return `${SPOTIFY_API_URL}/playlists/${encodeURIComponent(playlistId)}/tracks?${params.toString()}`;
}

export function getCurrentUserPlaylists(
    accessToken: string,
    pageSize: number = PLAYLIST_PAGE_SIZE,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): AsyncGenerator<SpotifySimplifiedPlaylist, void, undefined> {
    return paginate<SpotifySimplifiedPlaylist>(currentUserPlaylistsUrl(pageSize), accessToken, retry);
}

export function getPlaylistTracks(
    accessToken: string,
    playlistId: string,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): AsyncGenerator<SpotifyPlaylistTrackItem, void, undefined> {
    return paginate<SpotifyPlaylistTrackItem>(playlistTracksUrl(playlistId), accessToken, retry);
}

// Fetch a single album
export async function getAlbum(
    accessToken: string,
    albumId: string,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<SpotifyFullAlbum> {
    const url = `${SPOTIFY_API_URL}/albums/${encodeURIComponent(albumId)}`;
    return fetchWithRetry<SpotifyFullAlbum>(url, accessToken, retry);
}

// Fetch a single artist, including genres
export async function getArtist(
    accessToken: string,
    artistId: string,
    retry: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<SpotifyFullArtist> {
    const url = `${SPOTIFY_API_URL}/artists/${encodeURIComponent(artistId)}`;
    return fetchWithRetry<SpotifyFullArtist>(url, accessToken, retry);
}
