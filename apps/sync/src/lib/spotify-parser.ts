import type { SpotifyPlaylistItem } from '../types/spotify';
import type { SourceEntry } from '../types/sync';

// Skips episodes, local files and tracks removed from the catalogue
export function parsePlaylistItems(items: SpotifyPlaylistItem[]): SourceEntry[] {
    const entries: SourceEntry[] = [];
    for (const item of items) {
        const track = item.track;
        if (!track || track.type !== 'track' || track.is_local || !track.id || !track.name) {
            continue;
        }

        entries.push({
            title: track.name,
            primaryAttribute: track.artists[0]?.name ?? '',
            collectionAttribute: track.album?.name ?? '',
            sourceId: track.id,
        });
    }
    return entries;
}
