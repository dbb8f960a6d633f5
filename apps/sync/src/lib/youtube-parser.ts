import type { SearchCandidate } from '../types/providers';
import type { DestinationEntry } from '../types/sync';
import type { YouTubePlaylistItem, YouTubeSearchResponse } from '../types/youtube';

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

// The Data API returns snippet titles HTML-escaped ("Don&#39;t Stop")
export function decodeHtmlEntities(value: string): string {
    return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
        if (entity[0] === '#') {
            const code = entity[1] === 'x' || entity[1] === 'X'
                ? parseInt(entity.slice(2), 16)
                : parseInt(entity.slice(1), 10);
            return Number.isFinite(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
        }
        return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    });
}

export function parseSearchResults(response: YouTubeSearchResponse): SearchCandidate[] {
    const candidates: SearchCandidate[] = [];
    for (const item of response.items) {
        const videoId = item.id.videoId;
        if (!videoId) {
            continue;
        }
        candidates.push({
            mediaId: videoId,
            title: decodeHtmlEntities(item.snippet?.title ?? ''),
            ownerLabel: decodeHtmlEntities(item.snippet?.channelTitle ?? ''),
        });
    }
    return candidates;
}

// Deleted and private videos come back without a video id and are skipped
export function parsePlaylistItems(items: YouTubePlaylistItem[]): DestinationEntry[] {
    const entries: DestinationEntry[] = [];
    for (const item of items) {
        const videoId = item.contentDetails?.videoId;
        if (!item.id || !videoId) {
            continue;
        }
        entries.push({
            entryId: item.id,
            mediaId: videoId,
            title: decodeHtmlEntities(item.snippet?.title ?? ''),
            ownerLabel: decodeHtmlEntities(item.snippet?.videoOwnerChannelTitle ?? ''),
            position: item.snippet?.position ?? 0,
        });
    }
    return entries;
}
