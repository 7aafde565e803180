import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  CorrelationStore,
  IngestionLoop,
  IngestionLoopState,
  TsaProfile,
  createStartupCheckTask,
} from '../../../core';
import {
  CORRELATION_STORE,
  INGESTION_LOOP,
  SCANTRAIL_CONFIG,
  TSA_PROFILE,
} from '../constants';
import type { ScanTrailModuleConfig } from '../scantrail.config';

export type IngestionRunnerState = IngestionLoopState | 'disabled';

/**
 * Ingestion Runner Service
 *
 * Starts the cooperative scheduler (startup check + ingestion loop) once the
 * application has bootstrapped, and stops it on shutdown after the message
 * in flight has been handled.
 */
@Injectable()
export class IngestionRunnerService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(IngestionRunnerService.name);
  private controller?: AbortController;
  private running?: Promise<void>;
  private failure?: Error;

  constructor(
    @Inject(SCANTRAIL_CONFIG)
    private readonly config: ScanTrailModuleConfig,
    @Inject(INGESTION_LOOP)
    private readonly loop: IngestionLoop,
    @Inject(CORRELATION_STORE)
    private readonly store: CorrelationStore,
    @Inject(TSA_PROFILE)
    private readonly profile: TsaProfile,
  ) {}

  onApplicationBootstrap(): void {
    if (this.config.ingestion?.enabled === false) {
      this.logger.log('Ingestion disabled');
      return;
    }
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.running) return;

    this.failure = undefined;
    this.controller = new AbortController();
    this.running = this.loop
      .run(this.controller.signal, [
        createStartupCheckTask(this.store, this.profile),
      ])
      .catch((error: unknown) => {
        this.failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Ingestion stopped: ${this.failure.message}`);
      });
  }

  /**
   * Abort the loop and wait for the in-flight message to finish
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.controller?.abort();
    await this.running;
    this.running = undefined;
  }

  getState(): IngestionRunnerState {
    if (this.failure) return 'failed';
    if (!this.running && this.loop.getState() === 'idle') {
      return this.config.ingestion?.enabled === false ? 'disabled' : 'idle';
    }
    return this.loop.getState();
  }

  getLastError(): string | undefined {
    return this.failure?.message ?? this.loop.getStatistics().lastError;
  }
}
