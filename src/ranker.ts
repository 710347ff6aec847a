import type { EnrichedItem, RankResult } from "./types";

/**
 * Sort by score (desc), then select what gets pushed to the channel.
 *
 * archiveSet: every input item exactly once; equal scores keep input order
 *             (Array.prototype.sort is stable).
 * notifySet:  archiveSet filtered to score >= minScore, capped at maxNotify.
 */
export function rankItems(enriched: readonly EnrichedItem[], minScore: number, maxNotify: number): RankResult {
    const archiveSet = [...enriched].sort((a, b) => b.score - a.score);
    const notifySet = archiveSet
        .filter((item) => item.score >= minScore)
        .slice(0, Math.max(0, maxNotify));
    return { notifySet, archiveSet };
}
