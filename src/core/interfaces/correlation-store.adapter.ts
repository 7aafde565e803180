import { ScanRecord, TimestampToken } from '../domain/models';
import {
  Pagination,
  ScanRecordFilter,
  ScanRecordQuery,
  CreateScanRecordDto,
  CreateTimestampTokenDto,
  StoreStatistics,
} from './common.types';

/**
 * Correlation store - durable, append-only persistence of scan records and
 * timestamp tokens keyed by a shared correlation identifier.
 *
 * Implementations must:
 * - reject a second scan record or token for a correlation identifier
 *   (DuplicateCorrelationError)
 * - reject a token whose scan record does not exist (MissingScanRecordError)
 * - return payload bytes exactly as they were written
 */
export interface CorrelationStore {
  // ==================== Scan Records ====================

  createScanRecord(dto: CreateScanRecordDto): Promise<ScanRecord>;

  findScanRecord(query: ScanRecordQuery): Promise<ScanRecord | null>;

  /**
   * List scan records in insertion order
   */
  listScanRecords(
    pagination: Pagination,
    filter?: ScanRecordFilter,
  ): Promise<ScanRecord[]>;

  countScanRecords(): Promise<number>;

  // ==================== Timestamp Tokens ====================

  createTimestampToken(dto: CreateTimestampTokenDto): Promise<TimestampToken>;

  findTimestampToken(correlationId: string): Promise<TimestampToken | null>;

  listTimestampTokens(pagination: Pagination): Promise<TimestampToken[]>;

  countTimestampTokens(): Promise<number>;

  // ==================== Transaction Support ====================

  /**
   * Run `work` against a transactional view of the store.
   * Everything written through `store` commits together or not at all.
   */
  withTransaction<T>(work: (store: CorrelationStore) => Promise<T>): Promise<T>;

  // ==================== Health & Monitoring ====================

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StoreStatistics>;
}

/**
 * A scan record or token already exists for the correlation identifier
 */
export class DuplicateCorrelationError extends Error {
  constructor(
    public readonly correlationId: string,
    public readonly entity: 'scan_record' | 'timestamp_token',
  ) {
    super(`A ${entity.replace('_', ' ')} already exists for ${correlationId}`);
    this.name = 'DuplicateCorrelationError';
  }
}

/**
 * A timestamp token was offered for a correlation identifier with no scan record
 */
export class MissingScanRecordError extends Error {
  constructor(public readonly correlationId: string) {
    super(`No scan record exists for ${correlationId}`);
    this.name = 'MissingScanRecordError';
  }
}

/**
 * The store could not complete a write
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}
