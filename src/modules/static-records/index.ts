// Repository
export {
  createJsonRecordRepo,
  type JsonRecordRepoOptions,
} from './shell/repo/json-file-repo.js';
export type { RecordRepo } from './core/ports.js';

// Errors
export { formatLoadError, formatSchemaErrors, type LoadError } from './core/errors.js';
