import type { LegoSet, PackagingType } from '../types.js';

/**
 * How many sets use each packaging type. Only types present in the data appear,
 * in the order they are first seen.
 */
export const packagingTypeSummary = (sets: readonly LegoSet[]): Map<PackagingType, number> => {
  const counts = new Map<PackagingType, number>();

  for (const set of sets) {
    counts.set(set.packagingType, (counts.get(set.packagingType) ?? 0) + 1);
  }

  return counts;
};
