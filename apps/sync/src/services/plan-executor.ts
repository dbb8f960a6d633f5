import type { Logger } from '../lib/logger';
import { AmbiguousStateError, QuotaExhaustedError, errorMessage } from '../lib/sync-errors';
import type { DestinationProvider } from '../types/providers';
import type { SyncIssue, SyncPhase, SyncPlan } from '../types/sync';

export type AbortReason = 'ambiguous_state' | 'quota_exhausted';

export interface ExecutionResult {
    insertedCount: number;
    removedCount: number;
    errors: SyncIssue[];
    abortReason: AbortReason | null;
}

type FailureAction = 'continue' | AbortReason;

/**
 * Applies a plan: every insert (ascending position) before any delete.
 * Ordinary failures are recorded and skipped. An ambiguous-state or quota
 * failure stops everything, both phases, keeping the counts so far.
 */
export class PlanExecutor {
    constructor(
        private readonly destination: DestinationProvider,
        private readonly log: Logger,
        private readonly onPhase: (phase: SyncPhase) => void = () => undefined
    ) {}

    async execute(plan: SyncPlan, playlistId: string): Promise<ExecutionResult> {
        const result: ExecutionResult = {
            insertedCount: 0,
            removedCount: 0,
            errors: [],
            abortReason: null,
        };

        this.log.info(
            { inserts: plan.inserts.length, deletes: plan.deletes.length },
            'Executing plan'
        );

        this.onPhase('inserting');
        const inserts = [...plan.inserts].sort((a, b) => a.targetPosition - b.targetPosition);
        for (const op of inserts) {
            try {
                await this.destination.insert(playlistId, op.mediaId, op.label, op.targetPosition);
                result.insertedCount++;
            } catch (error) {
                const action = this.recordFailure(result, 'add', op.label, error);
                if (action !== 'continue') {
                    return this.abort(result, action);
                }
            }
        }

        this.onPhase('deleting');
        for (const op of plan.deletes) {
            try {
                await this.destination.delete(op.entryId, op.label);
                result.removedCount++;
            } catch (error) {
                const action = this.recordFailure(result, 'remove', op.label, error);
                if (action !== 'continue') {
                    return this.abort(result, action);
                }
            }
        }

        return result;
    }

    private recordFailure(
        result: ExecutionResult,
        verb: 'add' | 'remove',
        label: string,
        error: unknown
    ): FailureAction {
        if (error instanceof AmbiguousStateError) {
            result.errors.push({
                code: 'aborted',
                message: `ABORT: ambiguous state on ${verb} ${label} - ${error.message}`,
            });
            this.log.error({ label, verb, error: error.message }, 'Sync aborted, destination state uncertain');
            return 'ambiguous_state';
        }

        if (error instanceof QuotaExhaustedError) {
            result.errors.push({
                code: 'quota_exhausted',
                message: `Quota exceeded on ${verb} ${label} - ${error.message}`,
            });
            this.log.error({ label, verb }, 'Sync halted, quota exhausted');
            return 'quota_exhausted';
        }

        const message = errorMessage(error);
        result.errors.push({
            code: 'operation_failed',
            message: `Failed to ${verb}: ${label} - ${message}`,
        });
        this.log.warn({ label, verb, error: message }, 'Operation failed, continuing');
        return 'continue';
    }

    private abort(result: ExecutionResult, reason: AbortReason): ExecutionResult {
        this.onPhase('aborted');
        result.abortReason = reason;
        return result;
    }
}
