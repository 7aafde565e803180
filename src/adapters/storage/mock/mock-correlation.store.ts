import {
  CorrelationStore,
  CreateScanRecordDto,
  CreateTimestampTokenDto,
  DuplicateCorrelationError,
  MissingScanRecordError,
  Pagination,
  PersistenceError,
  ScanRecord,
  ScanRecordFilter,
  ScanRecordQuery,
  StoreStatistics,
  TimestampToken,
} from '../../../core';

type Write =
  | { entity: 'scan_record'; record: ScanRecord }
  | { entity: 'timestamp_token'; token: TimestampToken };

/**
 * In-memory correlation store for tests and the `mock` storage type.
 * Enforces the same uniqueness and foreign-key rules as the database
 * schema; withTransaction undoes the writes made through its scope when
 * the work throws, leaving concurrent writes in place.
 */
export class MockCorrelationStore implements CorrelationStore {
  private scanRecords: Map<string, ScanRecord> = new Map();
  private scanRecordsByCorrelationId: Map<string, string> = new Map();
  private timestampTokens: Map<string, TimestampToken> = new Map();

  private idCounter = 0;
  private failingWrites = 0;
  private healthy = true;

  private generateId(): string {
    return `mock-${++this.idCounter}`;
  }

  private checkWrite(operation: string): void {
    if (!this.healthy) {
      throw new PersistenceError('Store is unavailable', operation);
    }
    if (this.failingWrites > 0) {
      this.failingWrites--;
      throw new PersistenceError('Simulated write failure', operation);
    }
  }

  // ==================== Scan Records ====================

  async createScanRecord(dto: CreateScanRecordDto): Promise<ScanRecord> {
    this.checkWrite('createScanRecord');

    if (this.scanRecordsByCorrelationId.has(dto.correlationId)) {
      throw new DuplicateCorrelationError(dto.correlationId, 'scan_record');
    }

    const record = new ScanRecord(
      this.generateId(),
      dto.correlationId,
      Buffer.from(dto.payloadBytes),
      new Date(),
      dto.probe ?? null,
      dto.scannedAt ?? null,
    );

    this.scanRecords.set(record.id, record);
    this.scanRecordsByCorrelationId.set(record.correlationId, record.id);

    return record;
  }

  async findScanRecord(query: ScanRecordQuery): Promise<ScanRecord | null> {

    const id =
      'id' in query
        ? query.id
        : this.scanRecordsByCorrelationId.get(query.correlationId);

    return id !== undefined ? this.scanRecords.get(id) ?? null : null;
  }

  async listScanRecords(
    pagination: Pagination,
    filter?: ScanRecordFilter,
  ): Promise<ScanRecord[]> {

    const text = filter?.text;
    const records = Array.from(this.scanRecords.values()).filter(
      (record) => !text || record.matches(text),
    );

    return records.slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async countScanRecords(): Promise<number> {
    return this.scanRecords.size;
  }

  // ==================== Timestamp Tokens ====================

  async createTimestampToken(dto: CreateTimestampTokenDto): Promise<TimestampToken> {
    this.checkWrite('createTimestampToken');

    if (!this.scanRecordsByCorrelationId.has(dto.correlationId)) {
      throw new MissingScanRecordError(dto.correlationId);
    }
    if (this.timestampTokens.has(dto.correlationId)) {
      throw new DuplicateCorrelationError(dto.correlationId, 'timestamp_token');
    }

    const token = new TimestampToken(
      this.generateId(),
      dto.correlationId,
      Buffer.from(dto.token),
    );
    this.timestampTokens.set(token.correlationId, token);

    return token;
  }

  async findTimestampToken(correlationId: string): Promise<TimestampToken | null> {
    return this.timestampTokens.get(correlationId) ?? null;
  }

  async listTimestampTokens(pagination: Pagination): Promise<TimestampToken[]> {
    return Array.from(this.timestampTokens.values()).slice(
      pagination.offset,
      pagination.offset + pagination.limit,
    );
  }

  async countTimestampTokens(): Promise<number> {
    return this.timestampTokens.size;
  }

  // ==================== Transaction Support ====================

  async withTransaction<T>(work: (store: CorrelationStore) => Promise<T>): Promise<T> {
    const scope = new MockTransactionScope(this);

    try {
      return await work(scope);
    } catch (error) {
      this.undo(scope.writes);
      throw error;
    }
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }

  async getStatistics(): Promise<StoreStatistics> {
    return {
      scanRecordCount: this.scanRecords.size,
      timestampTokenCount: this.timestampTokens.size,
    };
  }

  // ==================== Test Helpers ====================

  /**
   * Make the next `count` writes throw PersistenceError
   */
  failNextWrites(count: number): void {
    this.failingWrites = count;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  clear(): void {
    this.scanRecords.clear();
    this.scanRecordsByCorrelationId.clear();
    this.timestampTokens.clear();
    this.idCounter = 0;
    this.failingWrites = 0;
    this.healthy = true;
  }

  private undo(writes: Write[]): void {
    for (const write of [...writes].reverse()) {
      if (write.entity === 'timestamp_token') {
        this.timestampTokens.delete(write.token.correlationId);
      } else {
        this.scanRecords.delete(write.record.id);
        this.scanRecordsByCorrelationId.delete(write.record.correlationId);
      }
    }
  }
}

/**
 * Store view handed to transactional work; remembers what it wrote
 */
class MockTransactionScope implements CorrelationStore {
  readonly writes: Write[] = [];

  constructor(private readonly store: MockCorrelationStore) {}

  async createScanRecord(dto: CreateScanRecordDto): Promise<ScanRecord> {
    const record = await this.store.createScanRecord(dto);
    this.writes.push({ entity: 'scan_record', record });
    return record;
  }

  async createTimestampToken(dto: CreateTimestampTokenDto): Promise<TimestampToken> {
    const token = await this.store.createTimestampToken(dto);
    this.writes.push({ entity: 'timestamp_token', token });
    return token;
  }

  findScanRecord(query: ScanRecordQuery): Promise<ScanRecord | null> {
    return this.store.findScanRecord(query);
  }

  listScanRecords(pagination: Pagination, filter?: ScanRecordFilter): Promise<ScanRecord[]> {
    return this.store.listScanRecords(pagination, filter);
  }

  countScanRecords(): Promise<number> {
    return this.store.countScanRecords();
  }

  findTimestampToken(correlationId: string): Promise<TimestampToken | null> {
    return this.store.findTimestampToken(correlationId);
  }

  listTimestampTokens(pagination: Pagination): Promise<TimestampToken[]> {
    return this.store.listTimestampTokens(pagination);
  }

  countTimestampTokens(): Promise<number> {
    return this.store.countTimestampTokens();
  }

  withTransaction<T>(work: (store: CorrelationStore) => Promise<T>): Promise<T> {
    return work(this);
  }

  isHealthy(): Promise<boolean> {
    return this.store.isHealthy();
  }

  getStatistics(): Promise<StoreStatistics> {
    return this.store.getStatistics();
  }
}
