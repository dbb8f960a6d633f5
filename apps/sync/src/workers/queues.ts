import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { SYNC_JOB_NAME, SYNC_JOB_OPTIONS, SYNC_QUEUE_NAME } from './worker-config';

export interface PlaylistSyncJob {
    trigger: 'cron' | 'manual';
}

export function createSyncQueue(connection: ConnectionOptions): Queue<PlaylistSyncJob> {
    return new Queue<PlaylistSyncJob>(SYNC_QUEUE_NAME, {
        connection,
        defaultJobOptions: SYNC_JOB_OPTIONS,
    });
}

// Repeatable jobs are keyed by name + pattern, so re-registering on every
// start does not stack duplicate schedules
export async function scheduleSync(queue: Queue<PlaylistSyncJob>, cronPattern: string): Promise<void> {
    await queue.add(SYNC_JOB_NAME, { trigger: 'cron' }, { repeat: { pattern: cronPattern } });
}
