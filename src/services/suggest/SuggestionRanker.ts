// Suggestion Ranker - one scoring rule shared by bang, performer and term autocomplete

const TIER_WEIGHT = 1000;
const PREFIX_TIER = 3;
const WORD_PREFIX_TIER = 2;
const CONTAINS_TIER = 1;

export interface Ranked<T> {
    item: T;
    score: number;
}

/**
 * Prefix beats word-prefix beats substring; within a tier shorter candidates
 * score higher. Zero means no match.
 */
export function scoreCandidate(candidate: string, input: string): number {
    const needle = input.trim().toLowerCase();
    const haystack = candidate.toLowerCase();
    if (!needle || !haystack) return 0;

    let tier = 0;
    if (haystack.startsWith(needle)) {
        tier = PREFIX_TIER;
    } else if (haystack.split(/\s+/).some(word => word.startsWith(needle))) {
        tier = WORD_PREFIX_TIER;
    } else if (haystack.includes(needle)) {
        tier = CONTAINS_TIER;
    }
    if (tier === 0) return 0;

    return tier * TIER_WEIGHT - Math.min(haystack.length, TIER_WEIGHT - 1);
}

/**
 * Scores every item by its best-matching key, drops non-matches and sorts by
 * descending score. Array#sort is stable, so ties keep table order.
 */
export function rankCandidates<T>(
    items: readonly T[],
    input: string,
    keys: (item: T) => readonly string[],
    limit: number,
): Ranked<T>[] {
    if (limit <= 0) return [];

    const ranked: Ranked<T>[] = [];
    for (const item of items) {
        const score = Math.max(0, ...keys(item).map(key => scoreCandidate(key, input)));
        if (score > 0) {
            ranked.push({ item, score });
        }
    }

    return ranked.sort((a, b) => b.score - a.score).slice(0, limit);
}

/**
 * Multi-word variant: an item's score is the sum of its scores against each
 * word, so terms sharing more of the query rank higher.
 */
export function rankByWords(items: readonly string[], words: readonly string[], limit: number): Ranked<string>[] {
    if (limit <= 0 || words.length === 0) return [];

    const ranked: Ranked<string>[] = [];
    for (const item of items) {
        const score = words.reduce((total, word) => total + scoreCandidate(item, word), 0);
        if (score > 0) {
            ranked.push({ item, score });
        }
    }

    return ranked.sort((a, b) => b.score - a.score).slice(0, limit);
}
