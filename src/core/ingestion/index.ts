export * from './ingestion-loop';
export * from './startup-check.task';
