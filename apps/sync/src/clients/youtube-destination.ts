import type { Logger } from '../lib/logger';
import type { YouTubeApi } from '../lib/youtube-api';
import { YouTubeConflictError, YouTubeQuotaExceededError } from '../lib/youtube-errors';
import { parsePlaylistItems, parseSearchResults } from '../lib/youtube-parser';
import { AmbiguousStateError, QuotaExhaustedError, UpstreamFetchError, errorMessage } from '../lib/sync-errors';
import type { DestinationProvider, SearchCandidate } from '../types/providers';
import type { DestinationEntry } from '../types/sync';

// Guards against a pagination loop on a misbehaving nextPageToken
export const MAX_PAGES = 200;

// Translate YouTube failures into the signals the executor acts on
function toSyncSignal(error: unknown): unknown {
    if (error instanceof YouTubeConflictError) {
        return new AmbiguousStateError(error.message);
    }
    if (error instanceof YouTubeQuotaExceededError) {
        return new QuotaExhaustedError(error.message);
    }
    return error;
}

export class YouTubeDestination implements DestinationProvider {
    constructor(
        private readonly api: YouTubeApi,
        private readonly log: Logger
    ) {}

    async fetchPlaylist(destPlaylistId: string): Promise<DestinationEntry[]> {
        const entries: DestinationEntry[] = [];
        let pageToken: string | undefined;

        try {
            for (let page = 0; page < MAX_PAGES; page++) {
                const response = await this.api.listPlaylistItems(destPlaylistId, pageToken);
                entries.push(...parsePlaylistItems(response.items));

                pageToken = response.nextPageToken;
                if (!pageToken) {
                    break;
                }
            }
            if (pageToken) {
                throw new Error(`Playlist still had more pages after ${MAX_PAGES} requests`);
            }
        } catch (error) {
            this.log.error({ playlistId: destPlaylistId, error: errorMessage(error) }, 'Failed to fetch YouTube playlist');
            const signal = toSyncSignal(error);
            if (signal instanceof QuotaExhaustedError) {
                throw signal;
            }
            throw new UpstreamFetchError('destination', errorMessage(error), error);
        }

        // Position order is what reconciliation compares against
        entries.sort((a, b) => a.position - b.position);
        this.log.info({ playlistId: destPlaylistId, count: entries.length }, 'Retrieved items from YouTube playlist');
        return entries;
    }

    async search(title: string, attribute: string): Promise<SearchCandidate[]> {
        try {
            const response = await this.api.search(`${title} ${attribute} official audio`);
            return parseSearchResults(response);
        } catch (error) {
            throw toSyncSignal(error);
        }
    }

    async insert(destPlaylistId: string, mediaId: string, label: string, targetPosition: number): Promise<void> {
        try {
            await this.api.insertPlaylistItem(destPlaylistId, mediaId, targetPosition);
        } catch (error) {
            this.log.error({ mediaId, label, error: errorMessage(error) }, 'Failed to add');
            throw toSyncSignal(error);
        }
        this.log.info({ position: targetPosition }, `Added: ${label || mediaId}`);
    }

    async delete(entryId: string, label: string): Promise<void> {
        try {
            await this.api.deletePlaylistItem(entryId);
        } catch (error) {
            this.log.error({ entryId, label, error: errorMessage(error) }, 'Failed to remove');
            throw toSyncSignal(error);
        }
        this.log.info(`Removed: ${label || entryId}`);
    }
}
