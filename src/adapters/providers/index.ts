export * from './http';
export * from './mock';
