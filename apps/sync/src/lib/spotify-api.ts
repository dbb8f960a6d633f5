import pRetry from 'p-retry';
import type { ZodType, ZodTypeDef } from 'zod';
import {
    spotifyPlaylistTracksPageSchema,
    spotifyTokenResponseSchema,
} from '../types/spotify';
import type { SpotifyPlaylistTracksPage, SpotifyTokenResponse } from '../types/spotify';
import {
    SpotifyApiError,
    SpotifyAuthError,
    SpotifyDownError,
    SpotifyForbiddenError,
    SpotifyNotFoundError,
    SpotifyRateLimitError,
    SpotifySchemaError,
    SpotifyUnauthenticatedError,
    isRetryableError,
} from './spotify-errors';

const SPOTIFY_API_URL = 'https://api.spotify.com/v1';
const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

export const PLAYLIST_PAGE_LIMIT = 100;

// Longest Retry-After we sit out inside a single run
const MAX_RETRY_AFTER_SECONDS = 60;

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// Handle API response and throw appropriate errors
async function handleResponse<T>(response: Response, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    if (response.ok) {
        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
            const first = parsed.error.issues[0];
            throw new SpotifySchemaError(
                `Unexpected Spotify response: ${first ? `${first.path.join('.')} ${first.message}` : 'invalid body'}`
            );
        }
        return parsed.data;
    }

    if (response.status === 401) {
        throw new SpotifyUnauthenticatedError();
    }

    if (response.status === 403) {
        throw new SpotifyForbiddenError();
    }

    if (response.status === 404) {
        throw new SpotifyNotFoundError();
    }

    if (response.status === 429) {
        const retryAfter = parseInt(response.headers.get('Retry-After') || '60', 10);
        throw new SpotifyRateLimitError(retryAfter);
    }

    if (response.status >= 500) {
        throw new SpotifyDownError(response.status);
    }

    // Other errors
    const errorText = await response.text();
    throw new SpotifyApiError(`Spotify API error: ${errorText}`, response.status, false);
}

async function send(url: string, init: RequestInit): Promise<Response> {
    try {
        return await fetch(url, init);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SpotifyDownError(0, `Network error: ${reason}`);
    }
}

// Wrapper for fetch with retry logic (5xx, network errors and 429)
async function fetchWithRetry<T>(
    url: string,
    accessToken: string,
    schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
    return pRetry(
        async () => {
            const response = await send(url, {
                headers: { Authorization: `Bearer ${accessToken}` },
            });
            return handleResponse(response, schema);
        },
        {
            retries: 3,
            onFailedAttempt: async (error) => {
                if (!isRetryableError(error)) {
                    throw error;
                }
                if (error instanceof SpotifyRateLimitError) {
                    await delay(Math.min(error.retryAfterSeconds, MAX_RETRY_AFTER_SECONDS) * 1000);
                }
            },
        }
    );
}

// Client credentials grant: enough for public playlists, no user involved
export async function requestClientCredentialsToken(
    clientId: string,
    clientSecret: string
): Promise<SpotifyTokenResponse> {
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const response = await send(SPOTIFY_TOKEN_URL, {
        method: 'POST',
        headers: {
            Authorization: `Basic ${basic}`,
            'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });

    if (response.status === 400 || response.status === 401) {
        const errorText = await response.text();
        throw new SpotifyAuthError(`Spotify rejected client credentials: ${errorText}`);
    }

    try {
        return await handleResponse(response, spotifyTokenResponseSchema);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SpotifyAuthError(`Spotify token request failed: ${reason}`);
    }
}

export function playlistTracksUrl(playlistId: string, offset: number): string {
    const params = new URLSearchParams({
        limit: String(PLAYLIST_PAGE_LIMIT),
        offset: String(offset),
        additional_types: 'track',
        fields: 'items(track(id,name,type,is_local,artists(name),album(name))),total,next,offset,limit',
    });
    return `${SPOTIFY_API_URL}/playlists/${encodeURIComponent(playlistId)}/tracks?${params.toString()}`;
}

export async function getPlaylistTracksPage(
    accessToken: string,
    playlistId: string,
    offset = 0
): Promise<SpotifyPlaylistTracksPage> {
    return fetchWithRetry(playlistTracksUrl(playlistId, offset), accessToken, spotifyPlaylistTracksPageSchema);
}
