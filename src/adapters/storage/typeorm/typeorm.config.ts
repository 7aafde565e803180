import { DataSource, DataSourceOptions } from 'typeorm';
import { ScanRecordEntity, TimestampTokenEntity } from './entities';

/**
 * TypeORM configuration for the correlation store
 */
export const createTypeORMConfig = (
  options?: Partial<PostgresOptions>,
): DataSourceOptions => {
  const defaultConfig: PostgresOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'scantrail',
    password: process.env.DB_PASSWORD || 'scantrail',
    database: process.env.DB_NAME || 'scantrail',
    entities: [ScanRecordEntity, TimestampTokenEntity],
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
    type: 'postgres',
  };
};

type PostgresOptions = Extract<DataSourceOptions, { type: 'postgres' }>;

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<PostgresOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
