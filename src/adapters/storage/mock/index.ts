export * from './mock-correlation.store';
