import type { DestinationEntry, SourceEntry } from './sync';

export interface SearchCandidate {
    mediaId: string;
    title: string;
    ownerLabel: string;
}

export interface SourceProvider {
    fetchPlaylist(sourcePlaylistId: string): Promise<SourceEntry[]>;
}

// Mutations resolve on success. A rejection with AmbiguousStateError aborts the
// run, QuotaExhaustedError trips the quota breaker, anything else is a
// per-item failure.
export interface DestinationProvider {
    fetchPlaylist(destPlaylistId: string): Promise<DestinationEntry[]>;
    search(title: string, attribute: string): Promise<SearchCandidate[]>;
    insert(destPlaylistId: string, mediaId: string, label: string, targetPosition: number): Promise<void>;
    delete(entryId: string, label: string): Promise<void>;
}
