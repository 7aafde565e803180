/**
 * Injection tokens for the scantrail module
 */

export const SCANTRAIL_CONFIG = Symbol('SCANTRAIL_CONFIG');
export const CORRELATION_STORE = Symbol('CORRELATION_STORE');
export const TRANSPORT_ADAPTER = Symbol('TRANSPORT_ADAPTER');
export const PROBE_QUEUE = Symbol('PROBE_QUEUE');
export const TIMESTAMP_AUTHORITY = Symbol('TIMESTAMP_AUTHORITY');
export const TSA_PROFILE = Symbol('TSA_PROFILE');
export const TIMESTAMP_CLIENT = Symbol('TIMESTAMP_CLIENT');
export const TOKEN_VERIFIER = Symbol('TOKEN_VERIFIER');
export const INGESTION_PROCESSOR = Symbol('INGESTION_PROCESSOR');
export const INGESTION_LOOP = Symbol('INGESTION_LOOP');
export const CORRELATION_SERVICE = Symbol('CORRELATION_SERVICE');
export const VERIFICATION_SERVICE = Symbol('VERIFICATION_SERVICE');

export const SERVICE_NAME = 'scantrail';
export const SERVICE_VERSION = '0.1.0';
