// Repository
export { createLegoSetRepo, type LegoSetRepoOptions } from './shell/repo/lego-set-repo.js';
export type { LegoSetRepo } from './core/ports.js';

// Queries
export { namesStartingWith, namesWithSameFirstAndLastLetter } from './core/usecases/filter-names.js';
export { distinctTagsWithoutSubtheme, numbersWithAtMostTags } from './core/usecases/filter-tags.js';
export { packagingTypeSummary } from './core/usecases/summarize-packaging.js';
export {
  allSetsWithinPieceLimit,
  DEFAULT_PIECE_LIMIT,
  sumOfPieces,
} from './core/usecases/summarize-pieces.js';
export {
  longestThemeName,
  setCountByTheme,
  subthemesByTheme,
} from './core/usecases/summarize-themes.js';

// Report
export { buildReport, DEFAULT_REPORT_OPTIONS } from './core/usecases/build-report.js';
export { renderReport } from './shell/console/render-report.js';

// Types
export {
  BRICKSET_RESOURCE,
  LegoSetSchema,
  PackagingTypeSchema,
  type LegoSet,
  type PackagingType,
  type ReportOptions,
  type ReportSection,
} from './core/types.js';
