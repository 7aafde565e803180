/**
 * Centralized Swagger decorators for the HTTP API
 *
 * These decorators provide consistent API documentation across all controllers
 * while keeping the controllers clean and focused on business logic.
 */

export * from './scan-record.decorators';
export * from './timestamp-token.decorators';
export * from './system.decorators';
export * from './probe-message.decorators';
export * from './health.decorators';
