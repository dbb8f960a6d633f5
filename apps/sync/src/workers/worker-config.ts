export const SYNC_QUEUE_NAME = 'playlist-sync';
export const SYNC_JOB_NAME = 'scheduled-sync';

// A failed run is never retried by the queue: mutations may have landed,
// so the next tick starts again from a fresh snapshot
export const SYNC_JOB_OPTIONS = {
    attempts: 1,
    removeOnComplete: 100,
    removeOnFail: 100,
};
