export { ScanRecordEntity } from './scan-record.entity';
export { TimestampTokenEntity } from './timestamp-token.entity';
