import { Logger } from '@nestjs/common';
import { MessageFate } from '../../domain/enums';
import {
  CorrelationStore,
  DuplicateCorrelationError,
  PersistenceError,
} from '../../interfaces';
import {
  IngestionContext,
  PersistRetryPolicy,
  PipelineStage,
  StageResult,
} from '../types';

/**
 * Stage 4: Persist
 * Writes the scan record and its token in one transaction.
 * Store failures are retried; exhausting the retries raises PersistenceError,
 * which the ingestion loop treats as fatal.
 */
export class PersistStage implements PipelineStage {
  name = 'persist';
  private readonly logger = new Logger(PersistStage.name);

  constructor(
    private readonly store: CorrelationStore,
    private readonly retry: PersistRetryPolicy,
    private readonly sleep: (ms: number) => Promise<void>,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const { message, receipt } = context;
    if (!message || !receipt) {
      return { success: true, context, shouldContinue: true };
    }

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(this.retry.delayMs);
      }

      try {
        const { scanRecord, timestampToken } = await this.store.withTransaction(
          async (tx) => {
            const scanRecord = await tx.createScanRecord({
              correlationId: message.correlationId,
              payloadBytes: message.payloadBytes,
              probe: message.probe,
              scannedAt: message.scannedAt,
            });
            const timestampToken = await tx.createTimestampToken({
              correlationId: message.correlationId,
              token: receipt.token,
            });
            return { scanRecord, timestampToken };
          },
        );

        context.scanRecord = scanRecord;
        context.timestampToken = timestampToken;
        context.fate = MessageFate.PERSISTED;

        return {
          success: true,
          context,
          shouldContinue: true,
          metadata: { attempts: attempt },
        };
      } catch (error) {
        if (error instanceof DuplicateCorrelationError) {
          context.fate = MessageFate.DUPLICATE;
          context.error = error;
          this.logger.warn(
            `Dropped message for ${message.correlationId}: ${error.message}`,
          );
          return { success: true, context, shouldContinue: false };
        }

        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          `Write attempt ${attempt}/${this.retry.maxAttempts} for ${message.correlationId} failed: ${lastError.message}`,
        );
      }
    }

    throw new PersistenceError(
      `Could not persist ${message.correlationId} after ${this.retry.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      'persist',
      lastError,
    );
  }
}
