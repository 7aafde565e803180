import {
  DataSource,
  EntityManager,
  QueryFailedError,
  Repository,
} from 'typeorm';
import { validate as isUuid } from 'uuid';
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
import { ScanRecordEntity, TimestampTokenEntity } from './entities';

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

/**
 * TypeORM implementation of CorrelationStore for PostgreSQL
 *
 * Uniqueness of correlation ids and the token -> record reference are
 * enforced by the schema; constraint violations surface as
 * DuplicateCorrelationError and MissingScanRecordError.
 */
export class TypeORMCorrelationStore implements CorrelationStore {
  private scanRecordRepo: Repository<ScanRecordEntity>;
  private timestampTokenRepo: Repository<TimestampTokenEntity>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly transactionManager?: EntityManager,
  ) {
    const manager = transactionManager ?? dataSource.manager;
    this.scanRecordRepo = manager.getRepository(ScanRecordEntity);
    this.timestampTokenRepo = manager.getRepository(TimestampTokenEntity);
  }

  /**
   * Scan Records
   */

  async createScanRecord(dto: CreateScanRecordDto): Promise<ScanRecord> {
    const entity = this.scanRecordRepo.create({
      correlationId: dto.correlationId,
      payload: dto.payloadBytes,
      probe: dto.probe ?? null,
      scannedAt: dto.scannedAt ?? null,
    });

    try {
      const saved = await this.scanRecordRepo.save(entity);
      return this.mapScanRecordEntityToDomain(saved);
    } catch (error) {
      throw this.translateWriteError(error, dto.correlationId, 'scan_record');
    }
  }

  async findScanRecord(query: ScanRecordQuery): Promise<ScanRecord | null> {
    // the id column is uuid; Postgres refuses to compare it with other text
    if ('id' in query && !isUuid(query.id)) {
      return null;
    }

    const entity = await this.scanRecordRepo.findOne({
      where: 'id' in query ? { id: query.id } : { correlationId: query.correlationId },
    });

    return entity ? this.mapScanRecordEntityToDomain(entity) : null;
  }

  async listScanRecords(
    pagination: Pagination,
    filter?: ScanRecordFilter,
  ): Promise<ScanRecord[]> {
    const qb = this.scanRecordRepo.createQueryBuilder('r');

    if (filter?.text) {
      qb.where(`convert_from(r.payload, 'UTF8') ILIKE :text`, {
        text: `%${escapeLikePattern(filter.text)}%`,
      });
    }

    qb.orderBy('r.createdAt', 'ASC')
      .addOrderBy('r.id', 'ASC')
      .skip(pagination.offset)
      .take(pagination.limit);

    const entities = await qb.getMany();
    return entities.map((entity) => this.mapScanRecordEntityToDomain(entity));
  }

  async countScanRecords(): Promise<number> {
    return this.scanRecordRepo.count();
  }

  /**
   * Timestamp Tokens
   */

  async createTimestampToken(dto: CreateTimestampTokenDto): Promise<TimestampToken> {
    const entity = this.timestampTokenRepo.create({
      correlationId: dto.correlationId,
      token: dto.token,
    });

    try {
      const saved = await this.timestampTokenRepo.save(entity);
      return this.mapTimestampTokenEntityToDomain(saved);
    } catch (error) {
      throw this.translateWriteError(error, dto.correlationId, 'timestamp_token');
    }
  }

  async findTimestampToken(correlationId: string): Promise<TimestampToken | null> {
    const entity = await this.timestampTokenRepo.findOne({
      where: { correlationId },
    });

    return entity ? this.mapTimestampTokenEntityToDomain(entity) : null;
  }

  async listTimestampTokens(pagination: Pagination): Promise<TimestampToken[]> {
    const entities = await this.timestampTokenRepo.find({
      order: { createdAt: 'ASC', id: 'ASC' },
      skip: pagination.offset,
      take: pagination.limit,
    });

    return entities.map((entity) => this.mapTimestampTokenEntityToDomain(entity));
  }

  async countTimestampTokens(): Promise<number> {
    return this.timestampTokenRepo.count();
  }

  /**
   * Transaction Support
   */

  async withTransaction<T>(work: (store: CorrelationStore) => Promise<T>): Promise<T> {
    if (this.transactionManager) {
      return work(this);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(
        new TypeORMCorrelationStore(this.dataSource, queryRunner.manager),
      );
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StoreStatistics> {
    const [scanRecordCount, timestampTokenCount] = await Promise.all([
      this.scanRecordRepo.count(),
      this.timestampTokenRepo.count(),
    ]);

    return { scanRecordCount, timestampTokenCount };
  }

  /**
   * Mapping helpers
   */

  private mapScanRecordEntityToDomain(entity: ScanRecordEntity): ScanRecord {
    return new ScanRecord(
      entity.id,
      entity.correlationId,
      Buffer.from(entity.payload),
      entity.createdAt,
      entity.probe,
      entity.scannedAt,
    );
  }

  private mapTimestampTokenEntityToDomain(entity: TimestampTokenEntity): TimestampToken {
    return new TimestampToken(
      entity.id,
      entity.correlationId,
      Buffer.from(entity.token),
      entity.createdAt,
    );
  }

  private translateWriteError(
    error: unknown,
    correlationId: string,
    entity: 'scan_record' | 'timestamp_token',
  ): Error {
    const code = driverErrorCode(error);

    if (code === PG_UNIQUE_VIOLATION) {
      return new DuplicateCorrelationError(correlationId, entity);
    }
    if (code === PG_FOREIGN_KEY_VIOLATION) {
      return new MissingScanRecordError(correlationId);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    return new PersistenceError(
      `Failed to write ${entity} for ${correlationId}: ${cause.message}`,
      `create_${entity}`,
      cause,
    );
  }
}

/**
 * SQLSTATE of a failed query, when the driver reported one
 */
export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;

  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

/**
 * Escape LIKE wildcards so user text matches literally
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (match) => `\\${match}`);
}
