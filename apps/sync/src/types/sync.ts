export interface SourceEntry {
    readonly title: string;
    readonly primaryAttribute: string;
    readonly collectionAttribute: string;
    readonly sourceId: string;
}

export interface DestinationEntry {
    // Playlist membership row; survives reordering
    readonly entryId: string;
    // The media itself; shared by every playlist that contains it
    readonly mediaId: string;
    readonly title: string;
    readonly ownerLabel: string;
    // Only valid at fetch time
    readonly position: number;
}

export interface ResolvedPair {
    entry: SourceEntry;
    mediaId: string;
}

export interface InsertOperation {
    kind: 'insert';
    targetPosition: number;
    mediaId: string;
    label: string;
}

export interface DeleteOperation {
    kind: 'delete';
    entryId: string;
    label: string;
}

export interface SyncPlan {
    inserts: InsertOperation[];
    deletes: DeleteOperation[];
}

export type SyncIssueCode =
    | 'unresolved'
    | 'operation_failed'
    | 'aborted'
    | 'quota_exhausted'
    | 'upstream_fetch'
    | 'unexpected';

export interface SyncIssue {
    code: SyncIssueCode;
    message: string;
}

export type SyncOutcome = 'success' | 'partial' | 'failed';

export type SyncPhase =
    | 'idle'
    | 'resolving'
    | 'reconciling'
    | 'inserting'
    | 'deleting'
    | 'done'
    | 'aborted';

export interface RunResult {
    success: boolean;
    outcome: SyncOutcome;
    insertedCount: number;
    removedCount: number;
    errors: SyncIssue[];
    sourceCount: number;
    destinationCountAfter: number;
    durationSeconds: number;
}

const FATAL_CODES: ReadonlySet<SyncIssueCode> = new Set<SyncIssueCode>([
    'aborted',
    'quota_exhausted',
    'upstream_fetch',
    'unexpected',
]);

export function isFatalIssue(issue: SyncIssue): boolean {
    return FATAL_CODES.has(issue.code);
}

export function failedResult(issue: SyncIssue, durationSeconds = 0): RunResult {
    return {
        success: false,
        outcome: 'failed',
        insertedCount: 0,
        removedCount: 0,
        errors: [issue],
        sourceCount: 0,
        destinationCountAfter: 0,
        durationSeconds,
    };
}
