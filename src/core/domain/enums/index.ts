export * from './message-fate.enum';
export * from './digest-algorithm.enum';
