/**
 * Edit planning for ordered playlists.
 *
 * Destination deletes address a stable membership id while inserts address a
 * position. The plan therefore keeps the longest run of destination entries
 * that already sit in target order (LIS), inserts everything else at its
 * target index in ascending order, and deletes the rest by id afterwards.
 */
import type {
    DeleteOperation,
    DestinationEntry,
    InsertOperation,
    ResolvedPair,
    SyncPlan,
} from '../types/sync';
import { entryLabel } from './video-resolver';

/**
 * Indices into `current` forming the longest subsequence whose target
 * positions strictly increase. O(n²); playlists here are small.
 */
export function findLisIndices(current: readonly string[], target: readonly string[]): Set<number> {
    const kept = new Set<number>();
    if (current.length === 0 || target.length === 0) {
        return kept;
    }

    const targetPos = new Map<string, number>();
    target.forEach((mediaId, index) => {
        if (!targetPos.has(mediaId)) {
            targetPos.set(mediaId, index);
        }
    });

    // [index in current, index in target]
    const items: Array<[number, number]> = [];
    current.forEach((mediaId, index) => {
        const position = targetPos.get(mediaId);
        if (position !== undefined) {
            items.push([index, position]);
        }
    });

    if (items.length === 0) {
        return kept;
    }

    const dp = new Array<number>(items.length).fill(1);
    const parent = new Array<number>(items.length).fill(-1);

    for (let i = 1; i < items.length; i++) {
        for (let j = 0; j < i; j++) {
            if (items[j][1] < items[i][1] && dp[j] + 1 > dp[i]) {
                dp[i] = dp[j] + 1;
                parent[i] = j;
            }
        }
    }

    // First index holding the maximum
    let end = 0;
    for (let i = 1; i < dp.length; i++) {
        if (dp[i] > dp[end]) end = i;
    }

    for (let idx = end; idx !== -1; idx = parent[idx]) {
        kept.add(items[idx][0]);
    }
    return kept;
}

// A media id listed twice in the source is mirrored once, at its first position
export function dedupeTarget(target: readonly ResolvedPair[]): ResolvedPair[] {
    const seen = new Set<string>();
    return target.filter(pair => {
        if (seen.has(pair.mediaId)) {
            return false;
        }
        seen.add(pair.mediaId);
        return true;
    });
}

export function computePlan(resolvedTarget: readonly ResolvedPair[], current: readonly DestinationEntry[]): SyncPlan {
    const target = dedupeTarget(resolvedTarget);
    const currentIds = current.map(item => item.mediaId);
    const targetIds = target.map(pair => pair.mediaId);
    const targetSet = new Set(targetIds);

    const lisIndices = findLisIndices(currentIds, targetIds);
    const keptMediaIds = new Set([...lisIndices].map(index => currentIds[index]));

    // Not wanted at all, or wanted but out of order (re-inserted below)
    const deletes: DeleteOperation[] = [];
    current.forEach((item, index) => {
        if (!targetSet.has(item.mediaId) || !lisIndices.has(index)) {
            deletes.push({ kind: 'delete', entryId: item.entryId, label: item.title || item.mediaId });
        }
    });

    const inserts: InsertOperation[] = [];
    target.forEach((pair, position) => {
        if (!keptMediaIds.has(pair.mediaId)) {
            inserts.push({
                kind: 'insert',
                targetPosition: position,
                mediaId: pair.mediaId,
                label: entryLabel(pair.entry),
            });
        }
    });

    // Each insert shifts later items right, so ascending order keeps every
    // following position valid without recomputation
    inserts.sort((a, b) => a.targetPosition - b.targetPosition);

    return { inserts, deletes };
}

export function isNoOp(plan: SyncPlan): boolean {
    return plan.inserts.length === 0 && plan.deletes.length === 0;
}
