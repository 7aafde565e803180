import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  CorrelationService,
  CorrelationStore,
  DigestAlgorithm,
  IngestionLoop,
  IngestionProcessor,
  PayloadValidator,
  TimestampAuthority,
  TimestampClient,
  TokenVerifier,
  TransportAdapter,
  TsaProfile,
  VerificationService,
  loadTsaProfile,
} from '../../core';
import { MockCorrelationStore } from '../../adapters/storage/mock';
import {
  TypeORMCorrelationStore,
  createDataSource,
} from '../../adapters/storage/typeorm';
import { QueueTransportAdapter } from '../../adapters/transport/queue';
import { HttpTimestampAuthority } from '../../adapters/providers/http';
import {
  ScanTrailModuleConfig,
  ScanTrailModuleAsyncConfig,
  mergeScanTrailConfig,
} from './scantrail.config';
import {
  CORRELATION_SERVICE,
  CORRELATION_STORE,
  INGESTION_LOOP,
  INGESTION_PROCESSOR,
  PROBE_QUEUE,
  SCANTRAIL_CONFIG,
  TIMESTAMP_AUTHORITY,
  TIMESTAMP_CLIENT,
  TOKEN_VERIFIER,
  TRANSPORT_ADAPTER,
  TSA_PROFILE,
  VERIFICATION_SERVICE,
} from './constants';
import {
  HealthController,
  ProbeMessageController,
  ScanRecordController,
  SystemController,
  TimestampTokenController,
} from './controllers';
import { ConfigurationService, IngestionRunnerService } from './services';
import { BodySizeGuard } from './middleware';

const CONTROLLERS = [
  ScanRecordController,
  TimestampTokenController,
  SystemController,
  HealthController,
  ProbeMessageController,
];

const EXPORTS = [
  SCANTRAIL_CONFIG,
  CORRELATION_STORE,
  TRANSPORT_ADAPTER,
  CORRELATION_SERVICE,
  VERIFICATION_SERVICE,
  INGESTION_LOOP,
  IngestionRunnerService,
];

/**
 * Scantrail Module - Main NestJS Module
 *
 * Builds every collaborator from configuration and wires them through
 * injection tokens
 */
@Global()
@Module({})
export class ScanTrailModule {
  /**
   * Configure synchronously
   */
  static forRoot(config: ScanTrailModuleConfig): DynamicModule {
    return {
      module: ScanTrailModule,
      providers: [
        {
          provide: SCANTRAIL_CONFIG,
          useValue: mergeScanTrailConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Configure asynchronously
   */
  static forRootAsync(options: ScanTrailModuleAsyncConfig): DynamicModule {
    return {
      module: ScanTrailModule,
      imports: options.imports || [],
      providers: [
        {
          provide: SCANTRAIL_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeScanTrailConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Providers built from the merged configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CORRELATION_STORE,
        useFactory: async (config: ScanTrailModuleConfig): Promise<CorrelationStore> => {
          switch (config.storage.type) {
            case 'mock':
              return new MockCorrelationStore();

            case 'typeorm': {
              const dataSource = createDataSource(config.storage.options);
              await dataSource.initialize();
              return new TypeORMCorrelationStore(dataSource);
            }

            case 'custom':
              if (!config.storage.store) {
                throw new Error('Custom correlation store not provided');
              }
              return config.storage.store;
          }
        },
        inject: [SCANTRAIL_CONFIG],
      },
      {
        provide: TRANSPORT_ADAPTER,
        useFactory: (config: ScanTrailModuleConfig): TransportAdapter =>
          config.ingestion?.transport ??
          new QueueTransportAdapter(config.ingestion?.queueCapacity),
        inject: [SCANTRAIL_CONFIG],
      },
      {
        provide: PROBE_QUEUE,
        useFactory: (transport: TransportAdapter): QueueTransportAdapter | null =>
          transport instanceof QueueTransportAdapter ? transport : null,
        inject: [TRANSPORT_ADAPTER],
      },
      {
        provide: TSA_PROFILE,
        useFactory: async (config: ScanTrailModuleConfig): Promise<TsaProfile> => {
          const { tsa } = config;
          const digestAlgorithm = tsa.digestAlgorithm ?? DigestAlgorithm.SHA256;

          if (tsa.trustAnchors) {
            return {
              url: tsa.url,
              digestAlgorithm,
              trustAnchors: tsa.trustAnchors,
              policyId: tsa.policyId,
            };
          }
          if (!tsa.certificateFile) {
            throw new Error('TSA trust anchor not configured (tsa.certificateFile)');
          }

          return loadTsaProfile({
            url: tsa.url,
            certificateFile: tsa.certificateFile,
            digestAlgorithm,
            policyId: tsa.policyId,
          });
        },
        inject: [SCANTRAIL_CONFIG],
      },
      {
        provide: TIMESTAMP_AUTHORITY,
        useFactory: (config: ScanTrailModuleConfig): TimestampAuthority =>
          config.tsa.authority ??
          new HttpTimestampAuthority({
            url: config.tsa.url,
            timeoutMs: config.tsa.timeoutMs,
            username: config.tsa.username,
            password: config.tsa.password,
          }),
        inject: [SCANTRAIL_CONFIG],
      },
      {
        provide: TIMESTAMP_CLIENT,
        useFactory: (
          config: ScanTrailModuleConfig,
          authority: TimestampAuthority,
          profile: TsaProfile,
        ) => new TimestampClient(authority, profile, { retry: config.tsa.retry }),
        inject: [SCANTRAIL_CONFIG, TIMESTAMP_AUTHORITY, TSA_PROFILE],
      },
      {
        provide: TOKEN_VERIFIER,
        useFactory: (profile: TsaProfile) => new TokenVerifier(profile),
        inject: [TSA_PROFILE],
      },
      {
        provide: INGESTION_PROCESSOR,
        useFactory: (
          config: ScanTrailModuleConfig,
          store: CorrelationStore,
          timestampClient: TimestampClient,
        ) =>
          new IngestionProcessor({
            validator: new PayloadValidator({
              maxMessageBytes: config.ingestion?.maxMessageBytes,
              maxPayloadDepth: config.ingestion?.maxPayloadDepth,
            }),
            timestampClient,
            store,
            persistRetry: config.ingestion?.persistRetry,
            hooks: config.hooks,
          }),
        inject: [SCANTRAIL_CONFIG, CORRELATION_STORE, TIMESTAMP_CLIENT],
      },
      {
        provide: INGESTION_LOOP,
        useFactory: (
          config: ScanTrailModuleConfig,
          transport: TransportAdapter,
          processor: IngestionProcessor,
        ) =>
          new IngestionLoop(transport, processor, {
            receiveTimeoutMs: config.ingestion?.receiveTimeoutMs ?? 10000,
            hooks: config.hooks,
          }),
        inject: [SCANTRAIL_CONFIG, TRANSPORT_ADAPTER, INGESTION_PROCESSOR],
      },
      {
        provide: CORRELATION_SERVICE,
        useFactory: (config: ScanTrailModuleConfig, store: CorrelationStore) =>
          new CorrelationService(store, config.ingestion?.maxPayloadDepth),
        inject: [SCANTRAIL_CONFIG, CORRELATION_STORE],
      },
      {
        provide: VERIFICATION_SERVICE,
        useFactory: (store: CorrelationStore, verifier: TokenVerifier) =>
          new VerificationService(store, verifier),
        inject: [CORRELATION_STORE, TOKEN_VERIFIER],
      },
      ConfigurationService,
      IngestionRunnerService,
      BodySizeGuard,
    ];
  }
}
