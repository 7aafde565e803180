import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import * as pkijs from 'pkijs';
import { DataSourceOptions } from 'typeorm';
import {
  CorrelationStore,
  DigestAlgorithm,
  LifecycleHooks,
  PersistRetryPolicy,
  RetryPolicy,
  TimestampAuthority,
  TransportAdapter,
} from '../../core';

type PostgresOptions = Extract<DataSourceOptions, { type: 'postgres' }>;

/**
 * Scantrail module configuration
 */
export interface ScanTrailModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<PostgresOptions>;
    store?: CorrelationStore;
  };

  /**
   * Timestamp authority configuration
   */
  tsa: {
    /**
     * RFC 3161 endpoint
     */
    url: string;

    /**
     * PEM or DER trust anchor file; ignored when `trustAnchors` is set
     */
    certificateFile?: string;
    trustAnchors?: pkijs.Certificate[];

    /**
     * Shared by the timestamp client and the verifier
     */
    digestAlgorithm?: DigestAlgorithm;

    /**
     * Requested TSA policy OID
     */
    policyId?: string;

    timeoutMs?: number;
    username?: string;
    password?: string;

    retry?: Partial<RetryPolicy>;

    /**
     * Replaces the HTTP authority (tests, other carriers)
     */
    authority?: TimestampAuthority;
  };

  /**
   * Ingestion loop configuration
   */
  ingestion?: {
    /**
     * Start the loop on application bootstrap
     * Default: true
     */
    enabled?: boolean;

    /**
     * How long one receive waits for a message
     * Default: 10000
     */
    receiveTimeoutMs?: number;

    /**
     * Capacity of the built-in queue transport
     * Default: 1000
     */
    queueCapacity?: number;

    /**
     * Largest accepted probe message in bytes
     * Default: 1 MiB
     */
    maxMessageBytes?: number;

    maxPayloadDepth?: number;

    persistRetry?: Partial<PersistRetryPolicy>;

    /**
     * Replaces the built-in queue transport
     */
    transport?: TransportAdapter;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;
}

/**
 * Async configuration options
 */
export interface ScanTrailModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<ScanTrailModuleConfig>['useFactory'];
  inject?: FactoryProvider['inject'];
}

/**
 * Default configuration
 */
export const defaultScanTrailConfig: Partial<ScanTrailModuleConfig> = {
  storage: {
    type: 'typeorm',
  },
  ingestion: {
    enabled: true,
    receiveTimeoutMs: 10000,
    queueCapacity: 1000,
    maxMessageBytes: 1024 * 1024,
    maxPayloadDepth: 32,
    persistRetry: { maxAttempts: 3, delayMs: 1000 },
  },
};

/**
 * Merge caller configuration over the defaults
 */
export function mergeScanTrailConfig(
  config: ScanTrailModuleConfig,
): ScanTrailModuleConfig {
  return {
    ...defaultScanTrailConfig,
    ...config,
    ingestion: { ...defaultScanTrailConfig.ingestion, ...config.ingestion },
    tsa: {
      digestAlgorithm: DigestAlgorithm.SHA256,
      timeoutMs: 30000,
      ...config.tsa,
    },
  };
}
