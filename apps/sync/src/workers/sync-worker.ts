import { Worker } from 'bullmq';
import type { ConnectionOptions, Job } from 'bullmq';
import type { Logger } from '../lib/logger';
import type { RunSyncOutcome } from '../jobs/run-sync';
import type { PlaylistSyncJob } from './queues';
import { SYNC_QUEUE_NAME } from './worker-config';

export interface SyncWorkerDeps {
    connection: ConnectionOptions;
    logger: Logger;
    run: () => Promise<RunSyncOutcome>;
}

export function createSyncProcessor(deps: Pick<SyncWorkerDeps, 'run'>) {
    return async function processSync(job: Pick<Job<PlaylistSyncJob>, 'log'>): Promise<RunSyncOutcome> {
        const outcome = await deps.run();
        if (outcome.status === 'skipped') {
            await job.log('Another sync holds the lock, skipped');
        } else {
            const { result } = outcome;
            await job.log(
                `Outcome ${result.outcome}: +${result.insertedCount} -${result.removedCount}, ` +
                `${result.errors.length} issue(s)`
            );
        }
        return outcome;
    };
}

// Concurrency 1: destination writes must never overlap
export function createSyncWorker(deps: SyncWorkerDeps): Worker<PlaylistSyncJob, RunSyncOutcome> {
    const log = deps.logger;
    const worker = new Worker<PlaylistSyncJob, RunSyncOutcome>(SYNC_QUEUE_NAME, createSyncProcessor(deps), {
        connection: deps.connection,
        concurrency: 1,
    });

    worker.on('completed', (job, outcome) => {
        if (outcome.status === 'skipped') {
            log.warn({ event: 'sync_skipped', jobId: job.id }, 'Sync skipped, lock held elsewhere');
            return;
        }
        const { result } = outcome;
        log.info(
            {
                event: 'sync_completed',
                jobId: job.id,
                outcome: result.outcome,
                added: result.insertedCount,
                removed: result.removedCount,
            },
            'Sync job completed'
        );
    });

    worker.on('failed', (job, error) => {
        log.error({ event: 'sync_failed', jobId: job?.id, error: error.message }, 'Sync job failed');
    });

    return worker;
}
