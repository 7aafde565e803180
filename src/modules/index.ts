export * from './scantrail';
