export * from './crypto-engine';
export * from './digest';
export * from './rfc3161';
export * from './tsa-profile';
export * from './retry-policy';
export * from './timestamp-client';
export * from './token-verifier';
