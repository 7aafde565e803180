export * from './correlation.service';
export * from './verification.service';
