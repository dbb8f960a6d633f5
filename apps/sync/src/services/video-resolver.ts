import type { Logger } from '../lib/logger';
import { QuotaExhaustedError, errorMessage } from '../lib/sync-errors';
import type { DestinationProvider, SearchCandidate } from '../types/providers';
import type { DestinationEntry, ResolvedPair, SourceEntry, SyncIssue } from '../types/sync';
import { normalizeText, pickBestCandidate } from './candidate-scorer';
import type { VideoCache } from './video-cache';

export type ResolutionSource = 'playlist' | 'cache' | 'search';

export interface Resolution {
    mediaId: string;
    source: ResolutionSource;
}

export interface TargetList {
    target: ResolvedPair[];
    errors: SyncIssue[];
}

export function entryLabel(entry: SourceEntry): string {
    return `${entry.title} by ${entry.primaryAttribute}`;
}

export function matchesDestinationTitle(entry: SourceEntry, destinationTitle: string): boolean {
    const title = normalizeText(destinationTitle);
    return (
        title.includes(normalizeText(entry.title)) &&
        title.includes(normalizeText(entry.primaryAttribute))
    );
}

export class VideoResolver {
    constructor(
        private readonly destination: DestinationProvider,
        private readonly cache: VideoCache,
        private readonly log: Logger
    ) {}

    // Playlist first (free), then cache (free), then search (expensive)
    async resolve(entry: SourceEntry, snapshot: readonly DestinationEntry[]): Promise<Resolution | null> {
        const existing = snapshot.find(item => matchesDestinationTitle(entry, item.title));
        if (existing) {
            this.cache.set(entry.title, entry.primaryAttribute, existing.mediaId);
            return { mediaId: existing.mediaId, source: 'playlist' };
        }

        const cached = this.cache.get(entry.title, entry.primaryAttribute);
        if (cached) {
            this.log.debug({ track: entry.title }, 'Cache hit');
            return { mediaId: cached, source: 'cache' };
        }

        const found = await this.search(entry);
        if (found) {
            this.cache.set(entry.title, entry.primaryAttribute, found);
            return { mediaId: found, source: 'search' };
        }
        return null;
    }

    async buildTargetList(
        entries: readonly SourceEntry[],
        snapshot: readonly DestinationEntry[]
    ): Promise<TargetList> {
        const target: ResolvedPair[] = [];
        const errors: SyncIssue[] = [];

        for (const entry of entries) {
            const resolution = await this.resolve(entry, snapshot);
            if (resolution) {
                target.push({ entry, mediaId: resolution.mediaId });
            } else {
                errors.push({ code: 'unresolved', message: `No match: ${entryLabel(entry)}` });
            }
        }

        return { target, errors };
    }

    private async search(entry: SourceEntry): Promise<string | null> {
        this.log.debug({ track: entry.title, artist: entry.primaryAttribute }, 'Searching destination');

        let candidates: SearchCandidate[];
        try {
            candidates = await this.destination.search(entry.title, entry.primaryAttribute);
        } catch (error) {
            if (error instanceof QuotaExhaustedError) {
                throw error;
            }
            this.log.error({ track: entry.title, error: errorMessage(error) }, 'Search failed');
            return null;
        }

        if (candidates.length === 0) {
            this.log.warn({ track: entry.title, artist: entry.primaryAttribute }, 'No search results');
            return null;
        }

        const picked = pickBestCandidate(candidates, {
            title: entry.title,
            artist: entry.primaryAttribute,
        });
        if (!picked) {
            return null;
        }

        if (picked.score === null) {
            this.log.warn(
                { track: entry.title, artist: entry.primaryAttribute, fallback: picked.candidate.title },
                'No confident match, using first result'
            );
        } else {
            this.log.debug({ score: picked.score, title: picked.candidate.title }, 'Best match');
        }
        return picked.candidate.mediaId;
    }
}
