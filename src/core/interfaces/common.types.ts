import { MessageFate } from '../domain/enums';

/**
 * Common types used across adapters
 */

/**
 * Offset pagination, as exposed by the listing endpoints
 */
export interface Pagination {
  offset: number;
  limit: number;
}

/**
 * Scan record listing filter
 */
export interface ScanRecordFilter {
  /**
   * Case-insensitive substring matched against the payload text
   */
  text?: string;
}

/**
 * Lookup key for a single scan record
 */
export type ScanRecordQuery = { id: string } | { correlationId: string };

/**
 * DTO for creating a scan record
 */
export interface CreateScanRecordDto {
  correlationId: string;
  payloadBytes: Buffer;
  probe?: string | null;
  scannedAt?: Date | null;
}

/**
 * DTO for creating a timestamp token
 */
export interface CreateTimestampTokenDto {
  correlationId: string;
  token: Buffer;
}

/**
 * Store statistics
 */
export interface StoreStatistics {
  scanRecordCount: number;
  timestampTokenCount: number;
}

/**
 * Emitted once per loop iteration
 */
export interface MessageFateEvent {
  fate: MessageFate;
  correlationId?: string;
  latencyMs: number;
  error?: Error;
}

/**
 * Lifecycle hooks for observing the ingestion pipeline
 */
export interface LifecycleHooks {
  /**
   * Called when a receive attempt has been classified
   */
  onMessageFate?: (event: MessageFateEvent) => void | Promise<void>;

  /**
   * Called when the loop stops because it can no longer persist
   */
  onFatal?: (error: Error) => void | Promise<void>;
}
