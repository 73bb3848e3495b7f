import type { LegoSet } from '../types.js';

export const DEFAULT_PIECE_LIMIT = 500;

/**
 * Total piece count, or null when there are no sets to add up.
 */
export const sumOfPieces = (sets: readonly LegoSet[]): number | null => {
  if (sets.length === 0) {
    return null;
  }

  return sets.reduce((total, set) => total + set.pieces, 0);
};

/**
 * Whether every set has at most `limit` pieces. True for an empty collection.
 */
export const allSetsWithinPieceLimit = (
  sets: readonly LegoSet[],
  limit: number = DEFAULT_PIECE_LIMIT
): boolean => sets.every((set) => set.pieces <= limit);
