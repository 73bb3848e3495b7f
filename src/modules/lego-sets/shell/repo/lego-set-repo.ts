import { createJsonRecordRepo, type LoadError } from '../../../static-records/index.js';
import { BRICKSET_RESOURCE, LegoSetSchema } from '../../core/types.js';

import type { LegoSetRepo } from '../../core/ports.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface LegoSetRepoOptions {
  /** Directory containing brickset.json. */
  dataDir: string;
  logger?: Logger;
}

export const createLegoSetRepo = (options: LegoSetRepoOptions): Result<LegoSetRepo, LoadError> =>
  createJsonRecordRepo({
    schema: LegoSetSchema,
    resourceName: BRICKSET_RESOURCE,
    rootDir: options.dataDir,
    ...(options.logger !== undefined && { logger: options.logger }),
  });
