import type { LegoSet } from './types.js';
import type { RecordRepo } from '../../static-records/index.js';

export type LegoSetRepo = RecordRepo<LegoSet>;
