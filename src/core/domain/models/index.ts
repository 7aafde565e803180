export { ScanRecord } from './scan-record.model';
export { TimestampToken } from './timestamp-token.model';
