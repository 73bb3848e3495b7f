import type { LegoSet } from '../types.js';

/**
 * The theme with the most characters. On a tie the theme seen first wins.
 */
export const longestThemeName = (sets: readonly LegoSet[]): string | null => {
  let longest: string | null = null;

  for (const { theme } of sets) {
    if (longest === null || theme.length > longest.length) {
      longest = theme;
    }
  }

  return longest;
};

/**
 * Number of sets per theme, keyed by the exact theme string.
 */
export const setCountByTheme = (sets: readonly LegoSet[]): Map<string, number> => {
  const counts = new Map<string, number>();

  for (const { theme } of sets) {
    counts.set(theme, (counts.get(theme) ?? 0) + 1);
  }

  return counts;
};

/**
 * Distinct subthemes per theme. Null subthemes are skipped, so a theme whose
 * sets have none still appears, mapped to an empty set.
 */
export const subthemesByTheme = (sets: readonly LegoSet[]): Map<string, Set<string>> => {
  const grouped = new Map<string, Set<string>>();

  for (const { theme, subtheme } of sets) {
    let subthemes = grouped.get(theme);
    if (subthemes === undefined) {
      subthemes = new Set<string>();
      grouped.set(theme, subthemes);
    }
    if (subtheme !== null) {
      subthemes.add(subtheme);
    }
  }

  return grouped;
};
