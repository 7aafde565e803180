export * from './types';
export * from './cooperative-scheduler';
