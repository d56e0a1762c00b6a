export class SpotifyApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly retryable: boolean
    ) {
        super(message);
        this.name = 'SpotifyApiError';
    }
}

export class SpotifyUnauthenticatedError extends SpotifyApiError {
    constructor(message = 'Access token expired or invalid') {
        super(message, 401, false);
        this.name = 'SpotifyUnauthenticatedError';
    }
}

export class SpotifyForbiddenError extends SpotifyApiError {
    constructor(message = 'Forbidden - check scopes or user access') {
        super(message, 403, false);
        this.name = 'SpotifyForbiddenError';
    }
}

// Entity-level: the caller skips the entity and carries on
export class SpotifyNotFoundError extends SpotifyApiError {
    constructor(
        public readonly resource: string,
        message = `Spotify resource not found: ${resource}`
    ) {
        super(message, 404, false);
        this.name = 'SpotifyNotFoundError';
    }
}

export class SpotifyRateLimitError extends SpotifyApiError {
    constructor(
        public readonly retryAfterSeconds: number,
        message = 'Rate limited by Spotify'
    ) {
        super(message, 429, true);
        this.name = 'SpotifyRateLimitError';
    }
}

export class SpotifyDownError extends SpotifyApiError {
    constructor(statusCode: number, message = 'Spotify service unavailable') {
        super(message, statusCode, true);
        this.name = 'SpotifyDownError';
    }
}

// The request never got a response (DNS, reset connection, undici "fetch failed")
export class SpotifyNetworkError extends SpotifyApiError {
    constructor(message = 'Network error talking to Spotify', options?: { cause?: unknown }) {
        super(message, 0, true);
        this.name = 'SpotifyNetworkError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

// Transient failures: rate limits, 5xx and dropped connections
export function isRetryableError(error: unknown): boolean {
    if (error instanceof SpotifyApiError) {
        return error.retryable;
    }
    if (error instanceof Error && error.message.includes('fetch failed')) {
        return true;
    }
    return false;
}

export function isNotFoundError(error: unknown): error is SpotifyNotFoundError {
    return error instanceof SpotifyNotFoundError;
}
