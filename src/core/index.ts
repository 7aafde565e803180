/**
 * Scantrail core - ingestion, timestamping and verification logic,
 * independent of the HTTP layer and the database
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Message validation
export * from './validation';

// RFC 3161 timestamping
export * from './timestamp';

// Ingestion pipeline
export * from './pipeline';

// Cooperative scheduling
export * from './scheduler';
export * from './ingestion';

// Core services
export * from './services';
