import pRetry from 'p-retry';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from './logger';
import type { AdaptiveRateLimiter } from './rate-limiter';
import {
    googleTokenResponseSchema,
    youtubeErrorBodySchema,
    youtubePlaylistItemsResponseSchema,
    youtubeSearchResponseSchema,
} from '../types/youtube';
import type { YouTubePlaylistItemsResponse, YouTubeSearchResponse } from '../types/youtube';
import {
    YouTubeApiError,
    YouTubeAuthError,
    YouTubeConflictError,
    YouTubeDownError,
    YouTubeQuotaExceededError,
    YouTubeRateLimitError,
    YouTubeUnauthenticatedError,
    isRetryableError,
} from './youtube-errors';

const YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';
const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';

const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;
const DEFAULT_RATE_LIMIT_WAIT_SECONDS = 60;
const MUSIC_CATEGORY_ID = '10';

export const SEARCH_MAX_RESULTS = 5;
export const PLAYLIST_PAGE_SIZE = 50;

export interface YouTubeApiOptions {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    logger: Logger;
    rateLimiter: AdaptiveRateLimiter;
    clock?: () => number;
    retries?: number;
    retryDelayMs?: number;
}

interface RequestSpec {
    method: 'GET' | 'POST' | 'DELETE';
    path: string;
    params: Record<string, string>;
    body?: unknown;
    name: string;
}

function errorReason(body: unknown): { reason: string | null; status: string | null; message: string } {
    const parsed = youtubeErrorBodySchema.safeParse(body);
    if (!parsed.success) {
        return { reason: null, status: null, message: '' };
    }
    const { error } = parsed.data;
    return {
        reason: error.errors?.find(e => e.reason)?.reason ?? null,
        status: error.status ?? null,
        message: error.message ?? '',
    };
}

// Map a non-2xx Data API response onto the error taxonomy
export async function toYouTubeError(response: Response): Promise<YouTubeApiError> {
    const text = await response.text();
    let body: unknown = null;
    try {
        body = JSON.parse(text);
    } catch {
        body = null;
    }
    const { reason, status, message } = errorReason(body);
    const detail = message || text.slice(0, 200);

    if (response.status === 401) {
        return new YouTubeUnauthenticatedError();
    }

    if (response.status === 403 && (reason === 'quotaExceeded' || reason === 'dailyLimitExceeded')) {
        return new YouTubeQuotaExceededError(`Quota exceeded: ${detail}`);
    }

    if (
        response.status === 429 ||
        (response.status === 403 && (reason === 'rateLimitExceeded' || reason === 'userRateLimitExceeded'))
    ) {
        const retryAfter = parseInt(response.headers.get('Retry-After') || '', 10);
        return new YouTubeRateLimitError(
            response.status,
            Number.isFinite(retryAfter) ? retryAfter : DEFAULT_RATE_LIMIT_WAIT_SECONDS
        );
    }

    if (
        response.status === 409 &&
        (status === 'SERVICE_UNAVAILABLE' || reason === 'SERVICE_UNAVAILABLE' || text.includes('SERVICE_UNAVAILABLE'))
    ) {
        return new YouTubeConflictError(`409 SERVICE_UNAVAILABLE: ${detail}`);
    }

    if (response.status >= 500) {
        return new YouTubeDownError(response.status);
    }

    return new YouTubeApiError(`YouTube API error ${response.status}: ${detail}`, response.status, false, reason);
}

/**
 * YouTube Data API v3 over fetch. Every call waits on the shared rate
 * limiter; 5xx, network and rate-limit failures are retried, everything
 * else surfaces immediately.
 */
export class YouTubeApi {
    private accessToken: string | null = null;
    private expiresAt = 0;
    private readonly clock: () => number;
    private readonly log: Logger;
    private readonly retries: number;
    private readonly retryDelayMs: number;

    constructor(private readonly options: YouTubeApiOptions) {
        this.clock = options.clock ?? Date.now;
        this.log = options.logger;
        this.retries = options.retries ?? 3;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
    }

    async search(query: string): Promise<YouTubeSearchResponse> {
        const name = `search '${query}'`;
        const response = await this.request({
            method: 'GET',
            path: '/search',
            params: {
                part: 'snippet',
                q: query,
                type: 'video',
                videoCategoryId: MUSIC_CATEGORY_ID,
                maxResults: String(SEARCH_MAX_RESULTS),
            },
            name,
        });
        return this.parse(response, youtubeSearchResponseSchema, name);
    }

    async listPlaylistItems(playlistId: string, pageToken?: string): Promise<YouTubePlaylistItemsResponse> {
        const params: Record<string, string> = {
            part: 'snippet,contentDetails',
            playlistId,
            maxResults: String(PLAYLIST_PAGE_SIZE),
        };
        if (pageToken) {
            params.pageToken = pageToken;
        }
        const name = `list playlist ${playlistId}`;
        const response = await this.request({
            method: 'GET',
            path: '/playlistItems',
            params,
            name,
        });
        return this.parse(response, youtubePlaylistItemsResponseSchema, name);
    }

    async insertPlaylistItem(playlistId: string, videoId: string, position: number): Promise<void> {
        await this.request({
            method: 'POST',
            path: '/playlistItems',
            params: { part: 'snippet' },
            body: {
                snippet: {
                    playlistId,
                    position,
                    resourceId: { kind: 'youtube#video', videoId },
                },
            },
            name: `add ${videoId}`,
        });
    }

    async deletePlaylistItem(itemId: string): Promise<void> {
        await this.request({
            method: 'DELETE',
            path: '/playlistItems',
            params: { id: itemId },
            name: `remove ${itemId}`,
        });
    }

    private async parse<T>(
        response: Response,
        schema: ZodType<T, ZodTypeDef, unknown>,
        name: string
    ): Promise<T> {
        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
            throw new YouTubeApiError(`Unexpected response shape on ${name}`, response.status, false);
        }
        return parsed.data;
    }

    private async request(spec: RequestSpec): Promise<Response> {
        return pRetry(
            async () => {
                await this.options.rateLimiter.acquire();
                const token = await this.getAccessToken();
                const url = `${YOUTUBE_API_URL}${spec.path}?${new URLSearchParams(spec.params).toString()}`;

                const response = await this.send(url, {
                    method: spec.method,
                    headers: {
                        Authorization: `Bearer ${token}`,
                        ...(spec.body === undefined ? {} : { 'Content-Type': 'application/json' }),
                    },
                    body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
                });

                if (!response.ok) {
                    throw await toYouTubeError(response);
                }
                this.options.rateLimiter.recordSuccess();
                return response;
            },
            {
                retries: this.retries,
                minTimeout: this.retryDelayMs,
                onFailedAttempt: (error) => {
                    if (error instanceof YouTubeUnauthenticatedError && error.attemptNumber === 1) {
                        this.accessToken = null;
                        return;
                    }
                    if (!isRetryableError(error)) {
                        throw error;
                    }
                    if (error instanceof YouTubeRateLimitError) {
                        // The limiter's pause covers the wait before the next attempt
                        this.options.rateLimiter.handleRateLimit(error.retryAfterSeconds);
                        return;
                    }
                    this.log.warn(
                        { operation: spec.name, attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
                        'YouTube request failed, retrying'
                    );
                },
            }
        );
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        try {
            return await fetch(url, init);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new YouTubeDownError(0, `Network error: ${reason}`);
        }
    }

    private async getAccessToken(): Promise<string> {
        if (this.accessToken && this.clock() < this.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
            return this.accessToken;
        }

        const response = await this.send(GOOGLE_TOKEN_URL, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
                client_id: this.options.clientId,
                client_secret: this.options.clientSecret,
                refresh_token: this.options.refreshToken,
                grant_type: 'refresh_token',
            }).toString(),
        });

        if (response.status === 400 || response.status === 401) {
            const errorText = await response.text();
            throw new YouTubeAuthError(`Google rejected the refresh token: ${errorText.slice(0, 200)}`);
        }
        if (!response.ok) {
            throw await toYouTubeError(response);
        }

        const parsed = googleTokenResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new YouTubeAuthError('Unexpected token response from Google');
        }

        this.accessToken = parsed.data.access_token;
        this.expiresAt = this.clock() + parsed.data.expires_in * 1000;
        this.log.debug({ expiresIn: parsed.data.expires_in }, 'YouTube access token refreshed');
        return this.accessToken;
    }
}
