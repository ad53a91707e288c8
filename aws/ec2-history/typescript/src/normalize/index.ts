/**
 * Normalization
 *
 * Validation of raw source records into typed units.
 */

export type { RegionBatch } from './normalizer.js';
export { Normalizer, UNKNOWN_INSTANCE_TYPE } from './normalizer.js';
export type { RejectedRecord } from './collector.js';
export { RecordErrorCollector } from './collector.js';
export { toEpochMillis } from './schemas.js';
