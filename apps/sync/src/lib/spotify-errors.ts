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
        super(message, 401, true);
        this.name = 'SpotifyUnauthenticatedError';
    }
}

export class SpotifyForbiddenError extends SpotifyApiError {
    constructor(message = 'Forbidden - playlist not available to this app') {
        super(message, 403, false);
        this.name = 'SpotifyForbiddenError';
    }
}

export class SpotifyNotFoundError extends SpotifyApiError {
    constructor(message = 'Playlist not found') {
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

// Client credentials rejected or token endpoint unusable
export class SpotifyAuthError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SpotifyAuthError';
    }
}

// The API answered 200 with a body we cannot read
export class SpotifySchemaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SpotifySchemaError';
    }
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof SpotifyApiError) {
        if (error instanceof SpotifyUnauthenticatedError) return false;
        return error.retryable;
    }
    if (error instanceof Error && error.message.includes('fetch failed')) {
        return true;
    }
    return false;
}
