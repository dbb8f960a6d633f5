export class YouTubeApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly retryable: boolean,
        public readonly reason: string | null = null
    ) {
        super(message);
        this.name = 'YouTubeApiError';
    }
}

export class YouTubeUnauthenticatedError extends YouTubeApiError {
    constructor(message = 'Access token expired or invalid') {
        super(message, 401, false, 'authError');
        this.name = 'YouTubeUnauthenticatedError';
    }
}

// Daily quota is spent; nothing will succeed until it resets
export class YouTubeQuotaExceededError extends YouTubeApiError {
    constructor(message = 'YouTube API quota exceeded') {
        super(message, 403, false, 'quotaExceeded');
        this.name = 'YouTubeQuotaExceededError';
    }
}

export class YouTubeRateLimitError extends YouTubeApiError {
    constructor(
        statusCode: number,
        public readonly retryAfterSeconds: number,
        message = 'Rate limited by YouTube'
    ) {
        super(message, statusCode, true, 'rateLimitExceeded');
        this.name = 'YouTubeRateLimitError';
    }
}

// 409 SERVICE_UNAVAILABLE: the write may or may not have landed
export class YouTubeConflictError extends YouTubeApiError {
    constructor(message = 'YouTube returned 409 SERVICE_UNAVAILABLE') {
        super(message, 409, false, 'SERVICE_UNAVAILABLE');
        this.name = 'YouTubeConflictError';
    }
}

export class YouTubeDownError extends YouTubeApiError {
    constructor(statusCode: number, message = 'YouTube service unavailable') {
        super(message, statusCode, true);
        this.name = 'YouTubeDownError';
    }
}

export class YouTubeAuthError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'YouTubeAuthError';
    }
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof YouTubeApiError) {
        return error.retryable;
    }
    if (error instanceof Error && error.message.includes('fetch failed')) {
        return true;
    }
    return false;
}
