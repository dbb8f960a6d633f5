import {
    SpotifyApiError,
    SpotifyDownError,
    SpotifyForbiddenError,
    SpotifyNotFoundError,
    SpotifyRateLimitError,
    SpotifyUnauthenticatedError,
    isRetryableError,
} from '../../../src/lib/spotify-errors';

describe('SpotifyApiError', () => {
    test('has correct properties', () => {
        const error = new SpotifyApiError('Test error', 400, false);
        expect(error.message).toBe('Test error');
        expect(error.statusCode).toBe(400);
        expect(error.retryable).toBe(false);
        expect(error.name).toBe('SpotifyApiError');
        expect(error).toBeInstanceOf(Error);
    });
});

describe('SpotifyUnauthenticatedError', () => {
    test('has statusCode 401 and a default message', () => {
        const error = new SpotifyUnauthenticatedError();
        expect(error.statusCode).toBe(401);
        expect(error.message).toBe('Access token expired or invalid');
        expect(error.name).toBe('SpotifyUnauthenticatedError');
    });
});

describe('SpotifyForbiddenError', () => {
    test('has statusCode 403 and is NOT retryable', () => {
        const error = new SpotifyForbiddenError();
        expect(error.statusCode).toBe(403);
        expect(error.retryable).toBe(false);
    });
});

describe('SpotifyNotFoundError', () => {
    test('has statusCode 404 and is NOT retryable', () => {
        const error = new SpotifyNotFoundError();
        expect(error.statusCode).toBe(404);
        expect(error.retryable).toBe(false);
        expect(error.message).toBe('Playlist not found');
    });
});

describe('SpotifyRateLimitError', () => {
    test('has statusCode 429 and stores retryAfterSeconds', () => {
        const error = new SpotifyRateLimitError(120);
        expect(error.statusCode).toBe(429);
        expect(error.retryable).toBe(true);
        expect(error.retryAfterSeconds).toBe(120);
    });
});

describe('SpotifyDownError', () => {
    test('keeps the 5xx statusCode and is retryable', () => {
        const error = new SpotifyDownError(502);
        expect(error.statusCode).toBe(502);
        expect(error.retryable).toBe(true);
    });
});

describe('isRetryableError', () => {
    test('retries server errors, rate limits and failed fetches', () => {
        expect(isRetryableError(new SpotifyDownError(503))).toBe(true);
        expect(isRetryableError(new SpotifyRateLimitError(1))).toBe(true);
        expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    });

    test('leaves token refresh to the caller', () => {
        expect(isRetryableError(new SpotifyUnauthenticatedError())).toBe(false);
    });

    test('does not retry client errors or unknown values', () => {
        expect(isRetryableError(new SpotifyForbiddenError())).toBe(false);
        expect(isRetryableError(new Error('boom'))).toBe(false);
        expect(isRetryableError('boom')).toBe(false);
    });
});
