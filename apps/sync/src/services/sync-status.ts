import type { Logger } from '../lib/logger';
import { writeJsonAtomic } from '../lib/atomic-file';
import type { RunResult } from '../types/sync';

export const STATUS_FILE = 'sync_status.json';

export interface SyncStatusRecord {
    status: 'running' | 'success' | 'failed';
    last_sync_time: string;
    tracks_added: number;
    tracks_removed: number;
    last_error: string | null;
    spotify_track_count: number;
    youtube_track_count: number;
}

export function statusFromResult(result: RunResult, at: Date): SyncStatusRecord {
    const lastIssue = result.errors[result.errors.length - 1];
    return {
        status: result.success ? 'success' : 'failed',
        last_sync_time: at.toISOString(),
        tracks_added: result.insertedCount,
        tracks_removed: result.removedCount,
        last_error: lastIssue ? lastIssue.message : null,
        spotify_track_count: result.sourceCount,
        youtube_track_count: result.destinationCountAfter,
    };
}

export function runningStatus(at: Date): SyncStatusRecord {
    return {
        status: 'running',
        last_sync_time: at.toISOString(),
        tracks_added: 0,
        tracks_removed: 0,
        last_error: null,
        spotify_track_count: 0,
        youtube_track_count: 0,
    };
}

// Status file for dashboards; losing a write never affects the sync itself
export class SyncStatusWriter {
    constructor(
        private readonly filePath: string,
        private readonly log: Logger,
        private readonly clock: () => Date = () => new Date()
    ) {}

    async writeRunning(): Promise<boolean> {
        return this.write(runningStatus(this.clock()));
    }

    async writeResult(result: RunResult): Promise<boolean> {
        return this.write(statusFromResult(result, this.clock()));
    }

    private async write(record: SyncStatusRecord): Promise<boolean> {
        try {
            await writeJsonAtomic(this.filePath, record);
            return true;
        } catch (error) {
            this.log.error({ error, filePath: this.filePath }, 'Status write failed');
            return false;
        }
    }
}
