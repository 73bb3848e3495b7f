import type { LegoSet } from '../types.js';

const compareCodeUnits = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/**
 * Catalog numbers of sets carrying at most `maxTags` tags.
 * Sets without tag data (null) are left out rather than counted as zero.
 */
export const numbersWithAtMostTags = (sets: readonly LegoSet[], maxTags: number): string[] =>
  sets
    .filter((set) => set.tags !== null && set.tags.length <= maxTags)
    .map((set) => set.number);

/**
 * Distinct tags of sets that have no subtheme, sorted.
 *
 * Sets with a subtheme, and sets without tag data, contribute nothing.
 */
export const distinctTagsWithoutSubtheme = (sets: readonly LegoSet[]): string[] => {
  const tags = new Set<string>();

  for (const set of sets) {
    if (set.subtheme !== null || set.tags === null) continue;
    for (const tag of set.tags) {
      tags.add(tag);
    }
  }

  return [...tags].sort(compareCodeUnits);
};
