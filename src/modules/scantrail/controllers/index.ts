export * from './scan-record.controller';
export * from './timestamp-token.controller';
export * from './system.controller';
export * from './health.controller';
export * from './probe-message.controller';
