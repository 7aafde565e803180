/**
 * Centralized DTOs for the HTTP API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './pagination.dto';
export * from './scan-record.dto';
export * from './timestamp-token.dto';
