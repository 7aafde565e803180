export * from './canonical-json';
export * from './scan-message';
export * from './payload-validator';
