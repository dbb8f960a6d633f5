import type { SearchCandidate } from '../types/providers';

export interface ScoreQuery {
    title: string;
    artist: string;
}

export interface ScoredCandidate {
    candidate: SearchCandidate;
    score: number;
    index: number;
}

// Channel suffixes used by label-run official uploads
const OFFICIAL_CHANNEL_MARKERS = ['vevo'];

const FUZZY_WORD_RATIO = 0.7;

export function normalizeText(value: string): string {
    return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Substring match, or for multi-word needles, at least 70% of the words found
 * individually ("the weeknd" still matches a title that only says "weeknd").
 */
export function fuzzyContains(haystack: string, needle: string): boolean {
    if (haystack.includes(needle)) {
        return true;
    }

    const words = needle.split(' ').filter(word => word.length > 0);
    if (words.length > 1) {
        const found = words.filter(word => haystack.includes(word)).length;
        return found >= words.length * FUZZY_WORD_RATIO;
    }

    return false;
}

// Returns null when the candidate is not eligible (title not found)
export function scoreCandidate(candidate: SearchCandidate, query: ScoreQuery): number | null {
    const title = normalizeText(candidate.title);
    const owner = normalizeText(candidate.ownerLabel);
    const wantedTitle = normalizeText(query.title);
    const wantedArtist = normalizeText(query.artist);

    if (!fuzzyContains(title, wantedTitle)) {
        return null;
    }

    let score = 10;

    if (fuzzyContains(title, wantedArtist)) score += 10;
    if (fuzzyContains(owner, wantedArtist)) score += 5;

    if (title.includes('official')) score += 3;
    if (title.includes('audio')) score += 2;
    if (OFFICIAL_CHANNEL_MARKERS.some(marker => owner.includes(marker))) score += 3;

    if (title.includes('cover')) score -= 10;
    if (title.includes('remix') && !wantedTitle.includes('remix')) score -= 5;
    if (title.includes('live') && !wantedTitle.includes('live')) score -= 3;
    if (title.includes('karaoke') || title.includes('instrumental')) score -= 10;

    return score;
}

export function rankCandidates(candidates: SearchCandidate[], query: ScoreQuery): ScoredCandidate[] {
    const scored: ScoredCandidate[] = [];
    candidates.forEach((candidate, index) => {
        const score = scoreCandidate(candidate, query);
        if (score !== null && score > 0) {
            scored.push({ candidate, score, index });
        }
    });

    // Array.prototype.sort is stable: equal scores keep search order
    return scored.sort((a, b) => b.score - a.score);
}

/**
 * Best positively scored candidate; otherwise the first raw search result, so
 * availability wins over precision when nothing looks like a clean match.
 */
export function pickBestCandidate(
    candidates: SearchCandidate[],
    query: ScoreQuery
): { candidate: SearchCandidate; score: number | null } | null {
    const [best] = rankCandidates(candidates, query);
    if (best) {
        return { candidate: best.candidate, score: best.score };
    }

    const [first] = candidates;
    return first ? { candidate: first, score: null } : null;
}
