import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { MessageFate } from '../domain/enums';
import { LifecycleHooks, MessageFateEvent, PersistenceError } from '../interfaces';
import {
  IngestionContext,
  PersistRetryPolicy,
  PipelineConfig,
  PipelineError,
  PipelineStage,
  ProcessingResult,
} from './types';
import { ValidationStage } from './stages/validation.stage';
import { DeduplicationStage } from './stages/deduplication.stage';
import { TimestampStage } from './stages/timestamp.stage';
import { PersistStage } from './stages/persist.stage';

const DEFAULT_PERSIST_RETRY: PersistRetryPolicy = {
  maxAttempts: 3,
  delayMs: 1000,
};

/**
 * IngestionProcessor runs one received message through the pipeline
 *
 * Pipeline stages:
 * 1. Validation - Parse and schema-check the message
 * 2. Deduplication - Drop correlation ids already stored
 * 3. Timestamp - Obtain an RFC 3161 token for the payload digest
 * 4. Persist - Store scan record and token together
 *
 * Dropped messages resolve with their fate. A PersistenceError is
 * rethrown as is; any other stage failure is wrapped in a PipelineError.
 */
export class IngestionProcessor {
  private readonly logger = new Logger(IngestionProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.stages = this.initializeStages();
  }

  async processMessage(rawMessage: Buffer): Promise<ProcessingResult> {
    const startTime = Date.now();
    const context: IngestionContext = {
      rawMessage,
      receivedAt: new Date(),
      processingId: uuidv4(),
    };
    const stageDurations = new Map<string, number>();

    await this.executePipeline(context, stageDurations);

    const result: ProcessingResult = {
      fate: context.fate ?? MessageFate.PERSISTED,
      correlationId: context.message?.correlationId,
      scanRecordId: context.scanRecord?.id,
      error: context.error,
      stageDurations,
      totalDurationMs: Date.now() - startTime,
    };

    if (result.fate === MessageFate.PERSISTED) {
      this.logger.log(
        `Persisted ${result.correlationId} (token serial ${context.receipt?.serialNumber}, ${result.totalDurationMs}ms)`,
      );
    }

    await this.emitFate({
      fate: result.fate,
      correlationId: result.correlationId,
      latencyMs: result.totalDurationMs,
      error: result.error,
    });

    return result;
  }

  /**
   * Call the onMessageFate hook; a failing hook is logged, never propagated
   */
  async emitFate(event: MessageFateEvent): Promise<void> {
    if (!this.hooks?.onMessageFate) return;

    try {
      await this.hooks.onMessageFate(event);
    } catch (error) {
      this.logger.error(
        `onMessageFate hook failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async executePipeline(
    context: IngestionContext,
    stageDurations: Map<string, number>,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (!result.success && result.error) {
          throw result.error;
        }

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (error instanceof PersistenceError) {
          throw error;
        }

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }
    }
  }

  private initializeStages(): PipelineStage[] {
    const retry: PersistRetryPolicy = {
      ...DEFAULT_PERSIST_RETRY,
      ...this.config.persistRetry,
    };
    retry.maxAttempts = Math.max(1, retry.maxAttempts);

    const sleep =
      this.config.sleep ??
      ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

    return [
      new ValidationStage(this.config.validator),
      new DeduplicationStage(this.config.store),
      new TimestampStage(this.config.timestampClient),
      new PersistStage(this.config.store, retry, sleep),
    ];
  }
}
