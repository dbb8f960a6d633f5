import type { Logger } from '../lib/logger';
import { getPlaylistTracksPage, PLAYLIST_PAGE_LIMIT, requestClientCredentialsToken } from '../lib/spotify-api';
import { SpotifyUnauthenticatedError } from '../lib/spotify-errors';
import { parsePlaylistItems } from '../lib/spotify-parser';
import { UpstreamFetchError, errorMessage } from '../lib/sync-errors';
import type { SourceProvider } from '../types/providers';
import type { SourceEntry } from '../types/sync';

// Refresh five minutes before Spotify says the token dies
const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

// Hard stop for a playlist whose `next` link never runs out
export const MAX_PAGES = 100;

export interface SpotifySourceOptions {
    clientId: string;
    clientSecret: string;
    logger: Logger;
    clock?: () => number;
}

export class SpotifySource implements SourceProvider {
    private accessToken: string | null = null;
    private expiresAt = 0;
    private readonly clock: () => number;
    private readonly log: Logger;

    constructor(private readonly options: SpotifySourceOptions) {
        this.clock = options.clock ?? Date.now;
        this.log = options.logger;
    }

    async fetchPlaylist(sourcePlaylistId: string): Promise<SourceEntry[]> {
        try {
            return await this.fetchAllTracks(sourcePlaylistId);
        } catch (error) {
            if (error instanceof SpotifyUnauthenticatedError) {
                // Token revoked early; one fresh attempt
                this.accessToken = null;
                try {
                    return await this.fetchAllTracks(sourcePlaylistId);
                } catch (retryError) {
                    throw this.fetchFailure(retryError);
                }
            }
            throw this.fetchFailure(error);
        }
    }

    private async fetchAllTracks(playlistId: string): Promise<SourceEntry[]> {
        const entries: SourceEntry[] = [];
        let offset = 0;

        let complete = false;

        for (let page = 0; page < MAX_PAGES; page++) {
            const token = await this.getToken();
            const response = await getPlaylistTracksPage(token, playlistId, offset);
            entries.push(...parsePlaylistItems(response.items));

            if (!response.next || response.items.length === 0) {
                complete = true;
                break;
            }
            offset += PLAYLIST_PAGE_LIMIT;
        }

        if (!complete) {
            throw new Error(`Playlist still had more pages after ${MAX_PAGES} requests`);
        }

        this.log.info({ playlistId, count: entries.length }, 'Retrieved tracks from Spotify');
        return entries;
    }

    private async getToken(): Promise<string> {
        if (this.accessToken && this.clock() < this.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
            return this.accessToken;
        }

        const token = await requestClientCredentialsToken(this.options.clientId, this.options.clientSecret);
        this.accessToken = token.access_token;
        this.expiresAt = this.clock() + token.expires_in * 1000;
        this.log.debug({ expiresIn: token.expires_in }, 'Spotify token obtained');
        return token.access_token;
    }

    private fetchFailure(error: unknown): UpstreamFetchError {
        this.log.error({ error: errorMessage(error) }, 'Failed to fetch Spotify playlist');
        return new UpstreamFetchError('source', errorMessage(error), error);
    }
}
