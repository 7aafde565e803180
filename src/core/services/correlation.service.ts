import { ScanRecord, TimestampToken } from '../domain/models';
import {
  CorrelationStore,
  Pagination,
  StoreStatistics,
} from '../interfaces';
import { NotFoundError, ValidationError } from '../pipeline/types';
import { canonicalJsonBytes, isJsonObject, jsonDepth } from '../validation';

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

export interface CreateScanRecordInput {
  correlationId: string;
  payload: Record<string, unknown>;
  probe?: string;
  scannedAt?: Date;
}

/**
 * Query-first access to the correlation store
 *
 * Backs the HTTP data-access surface. Writes here are append-only like the
 * ingestion loop's; lookups of unknown keys raise NotFoundError.
 */
export class CorrelationService {
  constructor(
    private readonly store: CorrelationStore,
    private readonly maxPayloadDepth = 32,
  ) {}

  // ==================== Scan Records ====================

  async createScanRecord(input: CreateScanRecordInput): Promise<ScanRecord> {
    if (!isJsonObject(input.payload)) {
      throw new ValidationError('payload must be a JSON object');
    }
    if (jsonDepth(input.payload) > this.maxPayloadDepth) {
      throw new ValidationError(
        `payload nesting exceeds ${this.maxPayloadDepth} levels`,
      );
    }

    return this.store.createScanRecord({
      correlationId: input.correlationId,
      payloadBytes: canonicalJsonBytes(input.payload),
      probe: input.probe ?? null,
      scannedAt: input.scannedAt ?? null,
    });
  }

  async getScanRecord(id: string): Promise<ScanRecord> {
    const record = await this.store.findScanRecord({ id });
    if (!record) {
      throw new NotFoundError('scan_record', id);
    }
    return record;
  }

  async getScanRecordByCorrelationId(correlationId: string): Promise<ScanRecord> {
    const record = await this.store.findScanRecord({ correlationId });
    if (!record) {
      throw new NotFoundError('scan_record', correlationId);
    }
    return record;
  }

  async listScanRecords(
    offset?: number,
    limit?: number,
    text?: string,
  ): Promise<ScanRecord[]> {
    return this.store.listScanRecords(
      this.page(offset, limit),
      text ? { text } : undefined,
    );
  }

  // ==================== Timestamp Tokens ====================

  /**
   * Store a token obtained elsewhere. The scan record must already exist.
   */
  async createTimestampToken(
    correlationId: string,
    token: Buffer,
  ): Promise<TimestampToken> {
    return this.store.createTimestampToken({ correlationId, token });
  }

  async getTimestampToken(correlationId: string): Promise<TimestampToken> {
    const token = await this.store.findTimestampToken(correlationId);
    if (!token) {
      throw new NotFoundError('timestamp_token', correlationId);
    }
    return token;
  }

  async listTimestampTokens(
    offset?: number,
    limit?: number,
  ): Promise<TimestampToken[]> {
    return this.store.listTimestampTokens(this.page(offset, limit));
  }

  // ==================== Statistics ====================

  async countScanRecords(): Promise<number> {
    return this.store.countScanRecords();
  }

  async getStatistics(): Promise<StoreStatistics> {
    return this.store.getStatistics();
  }

  private page(offset = 0, limit = DEFAULT_PAGE_SIZE): Pagination {
    return {
      offset: Math.max(0, Math.floor(offset)),
      limit: Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(limit))),
    };
  }
}
