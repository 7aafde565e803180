/**
 * Scantrail
 *
 * Ingests probe scan results, anchors each one with an RFC 3161 timestamp
 * token, and verifies stored records against their tokens.
 */

// Core components
export * from './core';

// Adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/providers';
export * from './adapters/transport/queue';

// NestJS module
export * from './modules';

// DTOs, swagger decorators and test factories
export * from './_shared';
