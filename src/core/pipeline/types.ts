import { MessageFate } from '../domain/enums';
import { ScanRecord, TimestampToken } from '../domain/models';
import { CorrelationStore, LifecycleHooks } from '../interfaces';
import type { ValidatedScanMessage, PayloadValidator } from '../validation';
import type { TimestampClient, TimestampReceipt } from '../timestamp';

/**
 * Ingestion context passed through the pipeline
 */
export interface IngestionContext {
  // Raw input
  rawMessage: Buffer;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Validation
  message?: ValidatedScanMessage;

  // Timestamping
  receipt?: TimestampReceipt;

  // Persistence
  scanRecord?: ScanRecord;
  timestampToken?: TimestampToken;

  // Outcome
  fate?: MessageFate;
  error?: Error;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: IngestionContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: IngestionContext): Promise<StageResult>;
}

/**
 * Write retry policy for the persist stage
 */
export interface PersistRetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  validator: PayloadValidator;
  timestampClient: TimestampClient;
  store: CorrelationStore;

  persistRetry?: Partial<PersistRetryPolicy>;
  hooks?: LifecycleHooks;

  /**
   * Injected for tests; defaults to setTimeout
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  fate: MessageFate;
  correlationId?: string;
  scanRecordId?: string;
  error?: Error;
  stageDurations: Map<string, number>;
  totalDurationMs: number;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: IngestionContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Message bytes do not form a valid probe message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type TimestampFailureReason =
  | 'transport'
  | 'rejected'
  | 'malformed'
  | 'mismatch'
  | 'untrusted';

/**
 * No usable timestamp token could be obtained for a payload
 */
export class TimestampRequestError extends Error {
  constructor(
    message: string,
    public readonly reason: TimestampFailureReason,
    public readonly attempts: number = 1,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TimestampRequestError';
  }
}

/**
 * Lookup of an unknown identifier
 */
export class NotFoundError extends Error {
  constructor(
    public readonly entity: 'scan_record' | 'timestamp_token',
    public readonly key: string,
  ) {
    super(`${entity === 'scan_record' ? 'Scan record' : 'Timestamp token'} not found: ${key}`);
    this.name = 'NotFoundError';
  }
}
