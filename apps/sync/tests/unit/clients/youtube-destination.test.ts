import { MAX_PAGES, YouTubeDestination } from '../../../src/clients/youtube-destination';
import { silentLogger } from '../../../src/lib/logger';
import { AdaptiveRateLimiter } from '../../../src/lib/rate-limiter';
import { AmbiguousStateError, QuotaExhaustedError, UpstreamFetchError } from '../../../src/lib/sync-errors';
import { YouTubeApi } from '../../../src/lib/youtube-api';
import {
    YouTubeApiError,
    YouTubeConflictError,
    YouTubeQuotaExceededError,
} from '../../../src/lib/youtube-errors';

function item(id: string, videoId: string, position: number) {
    return { id, snippet: { title: `Video ${videoId}`, position }, contentDetails: { videoId } };
}

describe('YouTubeDestination', () => {
    let api: YouTubeApi;
    let destination: YouTubeDestination;

    beforeEach(() => {
        api = new YouTubeApi({
            clientId: 'test-client',
            clientSecret: 'test-secret',
            refreshToken: 'test-refresh-token',
            logger: silentLogger(),
            rateLimiter: new AdaptiveRateLimiter({ logger: silentLogger() }),
        });
        destination = new YouTubeDestination(api, silentLogger());
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('fetchPlaylist', () => {
        test('follows page tokens and orders by position', async () => {
            const list = jest
                .spyOn(api, 'listPlaylistItems')
                .mockResolvedValueOnce({ items: [item('i-2', 'v2', 1), item('i-1', 'v1', 0)], nextPageToken: 'p2' })
                .mockResolvedValueOnce({ items: [item('i-3', 'v3', 2)] });

            const entries = await destination.fetchPlaylist('PL1');

            expect(entries.map(entry => entry.entryId)).toEqual(['i-1', 'i-2', 'i-3']);
            expect(list.mock.calls).toEqual([
                ['PL1', undefined],
                ['PL1', 'p2'],
            ]);
        });

        test('refuses to return a truncated playlist when page tokens never run out', async () => {
            const list = jest
                .spyOn(api, 'listPlaylistItems')
                .mockResolvedValue({ items: [item('i-1', 'v1', 0)], nextPageToken: 'again' });

            await expect(destination.fetchPlaylist('PL1')).rejects.toMatchObject({
                name: 'UpstreamFetchError',
                service: 'destination',
                message: `Playlist still had more pages after ${MAX_PAGES} requests`,
            });
            expect(list).toHaveBeenCalledTimes(MAX_PAGES);
        });

        test('surfaces quota exhaustion as such', async () => {
            jest.spyOn(api, 'listPlaylistItems').mockRejectedValue(new YouTubeQuotaExceededError());

            await expect(destination.fetchPlaylist('PL1')).rejects.toBeInstanceOf(QuotaExhaustedError);
        });

        test('wraps other failures as an upstream fetch error', async () => {
            jest.spyOn(api, 'listPlaylistItems').mockRejectedValue(new YouTubeApiError('Not found', 404, false));

            await expect(destination.fetchPlaylist('PL1')).rejects.toMatchObject({
                name: 'UpstreamFetchError',
                service: 'destination',
                message: 'Not found',
            });
            await expect(destination.fetchPlaylist('PL1')).rejects.toBeInstanceOf(UpstreamFetchError);
        });
    });

    describe('search', () => {
        test('asks for the official audio of title and artist', async () => {
            const search = jest.spyOn(api, 'search').mockResolvedValue({
                items: [{ id: { videoId: 'vid-1' }, snippet: { title: 'Song', channelTitle: 'Artist' } }],
            });

            const candidates = await destination.search('Song', 'Artist');

            expect(search).toHaveBeenCalledWith('Song Artist official audio');
            expect(candidates).toEqual([{ mediaId: 'vid-1', title: 'Song', ownerLabel: 'Artist' }]);
        });

        test('turns quota exhaustion into the run-level signal', async () => {
            jest.spyOn(api, 'search').mockRejectedValue(new YouTubeQuotaExceededError());

            await expect(destination.search('Song', 'Artist')).rejects.toBeInstanceOf(QuotaExhaustedError);
        });
    });

    describe('insert', () => {
        test('inserts at the target position', async () => {
            const insert = jest.spyOn(api, 'insertPlaylistItem').mockResolvedValue(undefined);

            await destination.insert('PL1', 'vid-1', 'Song by Artist', 3);

            expect(insert).toHaveBeenCalledWith('PL1', 'vid-1', 3);
        });

        test('a 409 conflict becomes an ambiguous state', async () => {
            jest.spyOn(api, 'insertPlaylistItem').mockRejectedValue(new YouTubeConflictError());

            await expect(destination.insert('PL1', 'vid-1', 'Song by Artist', 0)).rejects.toBeInstanceOf(
                AmbiguousStateError
            );
        });

        test('other failures pass through unchanged', async () => {
            const failure = new YouTubeApiError('Video not found', 404, false);
            jest.spyOn(api, 'insertPlaylistItem').mockRejectedValue(failure);

            await expect(destination.insert('PL1', 'vid-1', 'Song by Artist', 0)).rejects.toBe(failure);
        });
    });

    describe('delete', () => {
        test('deletes by playlist item id', async () => {
            const remove = jest.spyOn(api, 'deletePlaylistItem').mockResolvedValue(undefined);

            await destination.delete('item-1', 'Old Song');

            expect(remove).toHaveBeenCalledWith('item-1');
        });

        test('quota exhaustion on delete becomes the run-level signal', async () => {
            jest.spyOn(api, 'deletePlaylistItem').mockRejectedValue(new YouTubeQuotaExceededError());

            await expect(destination.delete('item-1', 'Old Song')).rejects.toBeInstanceOf(QuotaExhaustedError);
        });
    });
});
