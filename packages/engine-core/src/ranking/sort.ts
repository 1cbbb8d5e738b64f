import type { RankedAlternative } from '../types.js';

type Unranked = Omit<RankedAlternative, 'rank'>;

/**
 * Sort by preferenceScore descending and assign 1-based ranks.
 * Equal scores fall back to input index, so ties keep input order
 * independent of the engine's sort implementation.
 */
export function sortByPreference(entries: readonly Unranked[]): RankedAlternative[] {
  return [...entries]
    .sort((a, b) => b.preferenceScore - a.preferenceScore || a.index - b.index)
    .map((entry, i) => ({ ...entry, rank: i + 1 }));
}
