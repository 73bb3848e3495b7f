import type { LegoSet } from '../types.js';

/**
 * Names whose lower-cased first character equals their last character as written.
 *
 * Only the first character is folded: "Anna" matches, "annA" does not.
 * A one-character name always matches.
 */
export const namesWithSameFirstAndLastLetter = (sets: readonly LegoSet[]): string[] =>
  sets
    .map((set) => set.name)
    .filter(
      (name) =>
        name.length === 1 || name.toLowerCase().charAt(0) === name.charAt(name.length - 1)
    );

/**
 * Names starting with `prefix`, ignoring case on both sides.
 */
export const namesStartingWith = (sets: readonly LegoSet[], prefix: string): string[] => {
  const needle = prefix.toLowerCase();
  return sets.map((set) => set.name).filter((name) => name.toLowerCase().startsWith(needle));
};
