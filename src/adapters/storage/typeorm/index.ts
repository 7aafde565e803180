/**
 * TypeORM correlation store for PostgreSQL
 */

export {
  TypeORMCorrelationStore,
  driverErrorCode,
  escapeLikePattern,
} from './typeorm-correlation.store';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
