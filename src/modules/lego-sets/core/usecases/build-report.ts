import { namesStartingWith, namesWithSameFirstAndLastLetter } from './filter-names.js';
import { distinctTagsWithoutSubtheme, numbersWithAtMostTags } from './filter-tags.js';
import { packagingTypeSummary } from './summarize-packaging.js';
import { allSetsWithinPieceLimit, DEFAULT_PIECE_LIMIT, sumOfPieces } from './summarize-pieces.js';
import { longestThemeName, setCountByTheme, subthemesByTheme } from './summarize-themes.js';

import type { LegoSet, ReportOptions, ReportSection } from '../types.js';

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  prefix: 'lava',
  maxTags: 5,
  pieceLimit: DEFAULT_PIECE_LIMIT,
};

const mapLines = <K, V>(map: Map<K, V>, format: (value: V) => string): string[] =>
  Array.from(map, ([key, value]) => `${String(key)}: ${format(value)}`);

const formatSubthemes = (subthemes: Set<string>): string =>
  subthemes.size === 0 ? '(none)' : [...subthemes].join(', ');

/**
 * Run every query over `sets` and collect the results as titled sections, in print order.
 *
 * Sections whose query has no result (no pieces to sum, no themes) are kept with no lines.
 */
export const buildReport = (
  sets: readonly LegoSet[],
  options: Partial<ReportOptions> = {}
): ReportSection[] => {
  const { prefix, maxTags, pieceLimit } = { ...DEFAULT_REPORT_OPTIONS, ...options };

  const sum = sumOfPieces(sets);
  const longestTheme = longestThemeName(sets);

  return [
    {
      title: `LEGO set names starting with "${prefix}":`,
      lines: namesStartingWith(sets, prefix),
    },
    {
      title: 'LEGO set names with the same letter at the beginning and the end:',
      lines: namesWithSameFirstAndLastLetter(sets),
    },
    {
      title: `LEGO set numbers with at most ${String(maxTags)} tags:`,
      lines: numbersWithAtMostTags(sets, maxTags),
    },
    {
      title: 'Packaging type summary:',
      lines: mapLines(packagingTypeSummary(sets), String),
    },
    {
      title: 'Sum of all LEGO pieces:',
      lines: sum === null ? [] : [String(sum)],
    },
    {
      title: `Do all sets have at most ${String(pieceLimit)} pieces?`,
      lines: [allSetsWithinPieceLimit(sets, pieceLimit) ? 'yes' : 'no'],
    },
    {
      title: 'Sorted, distinct tags of sets that have no subtheme:',
      lines: distinctTagsWithoutSubtheme(sets),
    },
    {
      title: 'Theme with the longest name:',
      lines: longestTheme === null ? [] : [longestTheme],
    },
    {
      title: 'Number of sets for each theme:',
      lines: mapLines(setCountByTheme(sets), String),
    },
    {
      title: 'Each theme with its distinct subthemes:',
      lines: mapLines(subthemesByTheme(sets), formatSubthemes),
    },
  ];
};
