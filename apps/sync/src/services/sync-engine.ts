import type { Logger } from '../lib/logger';
import { QuotaExhaustedError, errorMessage } from '../lib/sync-errors';
import type { DestinationProvider, SourceProvider } from '../types/providers';
import type {
    DestinationEntry,
    RunResult,
    SourceEntry,
    SyncIssue,
    SyncOutcome,
    SyncPhase,
} from '../types/sync';
import { failedResult, isFatalIssue } from '../types/sync';
import { PlanExecutor } from './plan-executor';
import { computePlan, isNoOp } from './reconciliation';
import type { VideoCache } from './video-cache';
import { VideoResolver } from './video-resolver';
import type { TargetList } from './video-resolver';

export interface SyncEngineDeps {
    source: SourceProvider;
    destination: DestinationProvider;
    cache: VideoCache;
    logger: Logger;
    // Milliseconds
    clock?: () => number;
}

const PHASE_TRANSITIONS: Record<SyncPhase, readonly SyncPhase[]> = {
    idle: ['resolving'],
    resolving: ['reconciling', 'done'],
    reconciling: ['inserting', 'done'],
    inserting: ['deleting', 'aborted'],
    deleting: ['done', 'aborted'],
    done: [],
    aborted: [],
};

/**
 * Mirrors a source playlist onto a destination playlist with as few
 * destination mutations as the LIS plan allows. Never throws for run
 * outcome: fatal conditions come back as a failed {@link RunResult}.
 */
export class SyncEngine {
    private phase: SyncPhase = 'idle';
    private readonly source: SourceProvider;
    private readonly destination: DestinationProvider;
    private readonly cache: VideoCache;
    private readonly log: Logger;
    private readonly clock: () => number;

    constructor(deps: SyncEngineDeps) {
        this.source = deps.source;
        this.destination = deps.destination;
        this.cache = deps.cache;
        this.log = deps.logger;
        this.clock = deps.clock ?? Date.now;
    }

    getPhase(): SyncPhase {
        return this.phase;
    }

    async reconcile(sourcePlaylistId: string, destPlaylistId: string): Promise<RunResult> {
        const startedAt = this.clock();
        const elapsed = () => (this.clock() - startedAt) / 1000;

        // Each run starts fresh; nothing carries over from an earlier one
        this.phase = 'idle';
        this.log.info({ cacheEntries: this.cache.size }, 'Starting sync');
        this.transition('resolving');

        let sourceEntries: SourceEntry[];
        try {
            sourceEntries = await this.source.fetchPlaylist(sourcePlaylistId);
        } catch (error) {
            if (error instanceof QuotaExhaustedError) {
                return this.fail('quota_exhausted', `Quota exceeded: ${error.message}`, elapsed());
            }
            return this.fail('upstream_fetch', `Failed to fetch source playlist: ${errorMessage(error)}`, elapsed());
        }
        this.log.info({ count: sourceEntries.length }, 'Fetched source playlist');

        let current: DestinationEntry[];
        try {
            current = await this.destination.fetchPlaylist(destPlaylistId);
        } catch (error) {
            if (error instanceof QuotaExhaustedError) {
                return this.fail('quota_exhausted', `Quota exceeded: ${error.message}`, elapsed());
            }
            return this.fail('upstream_fetch', `Failed to fetch destination playlist: ${errorMessage(error)}`, elapsed());
        }
        this.log.info({ count: current.length }, 'Fetched destination playlist');

        const resolver = new VideoResolver(this.destination, this.cache, this.log.child({ component: 'resolver' }));
        let resolved: TargetList;
        try {
            resolved = await resolver.buildTargetList(sourceEntries, current);
        } catch (error) {
            await this.cache.save();
            if (error instanceof QuotaExhaustedError) {
                return this.fail('quota_exhausted', `Quota exceeded: ${error.message}`, elapsed());
            }
            throw error;
        }

        this.transition('reconciling');
        const plan = computePlan(resolved.target, current);

        if (isNoOp(plan)) {
            this.log.info('Playlists already in sync');
            await this.cache.save();
            this.transition('done');
            return this.buildResult({
                insertedCount: 0,
                removedCount: 0,
                resolveErrors: resolved.errors,
                execErrors: [],
                sourceCount: sourceEntries.length,
                destinationCountAfter: current.length,
                durationSeconds: elapsed(),
            });
        }

        const executor = new PlanExecutor(
            this.destination,
            this.log.child({ component: 'executor' }),
            phase => this.transition(phase)
        );
        const execution = await executor.execute(plan, destPlaylistId);
        await this.cache.save();

        if (execution.abortReason === null) {
            this.transition('done');
        }

        const result = this.buildResult({
            insertedCount: execution.insertedCount,
            removedCount: execution.removedCount,
            resolveErrors: resolved.errors,
            execErrors: execution.errors,
            sourceCount: sourceEntries.length,
            destinationCountAfter: current.length + execution.insertedCount - execution.removedCount,
            durationSeconds: elapsed(),
        });

        this.log.info(
            {
                added: result.insertedCount,
                removed: result.removedCount,
                durationSeconds: Number(result.durationSeconds.toFixed(1)),
                aborted: execution.abortReason,
            },
            'Sync completed'
        );
        return result;
    }

    private buildResult(parts: {
        insertedCount: number;
        removedCount: number;
        resolveErrors: SyncIssue[];
        execErrors: SyncIssue[];
        sourceCount: number;
        destinationCountAfter: number;
        durationSeconds: number;
    }): RunResult {
        const errors = [...parts.resolveErrors, ...parts.execErrors];
        const fatal = errors.some(isFatalIssue);
        let outcome: SyncOutcome = 'success';
        if (fatal) {
            outcome = 'failed';
        } else if (errors.length > 0) {
            outcome = 'partial';
        }

        return {
            // Unresolved tracks alone do not fail a run
            success: !fatal && parts.execErrors.length === 0,
            outcome,
            insertedCount: parts.insertedCount,
            removedCount: parts.removedCount,
            errors,
            sourceCount: parts.sourceCount,
            destinationCountAfter: parts.destinationCountAfter,
            durationSeconds: parts.durationSeconds,
        };
    }

    private fail(code: SyncIssue['code'], message: string, durationSeconds: number): RunResult {
        this.log.error({ code }, message);
        this.transition('done');
        return failedResult({ code, message }, durationSeconds);
    }

    private transition(next: SyncPhase): void {
        if (!PHASE_TRANSITIONS[this.phase].includes(next)) {
            throw new Error(`Invalid sync phase transition: ${this.phase} -> ${next}`);
        }
        this.log.debug({ from: this.phase, to: next }, 'Phase change');
        this.phase = next;
    }
}
