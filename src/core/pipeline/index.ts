/**
 * Scan message ingestion pipeline
 *
 * 1. Validation - Parse and schema-check the message
 * 2. Deduplication - Drop correlation ids already stored
 * 3. Timestamp - Obtain an RFC 3161 token
 * 4. Persist - Store scan record and token atomically
 */

export { IngestionProcessor } from './ingestion-processor';

export * from './types';

export { ValidationStage } from './stages/validation.stage';
export { DeduplicationStage } from './stages/deduplication.stage';
export { TimestampStage } from './stages/timestamp.stage';
export { PersistStage } from './stages/persist.stage';
