export * from './ingestion-runner.service';
export * from './configuration.service';
