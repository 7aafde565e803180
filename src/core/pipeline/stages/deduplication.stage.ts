import { Logger } from '@nestjs/common';
import { MessageFate } from '../../domain/enums';
import { CorrelationStore, DuplicateCorrelationError } from '../../interfaces';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 2: Deduplication
 * Drops a redelivered message before a token is spent on it
 */
export class DeduplicationStage implements PipelineStage {
  name = 'deduplication';
  private readonly logger = new Logger(DeduplicationStage.name);

  constructor(private readonly store: CorrelationStore) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const message = context.message;
    if (!message) {
      return { success: true, context, shouldContinue: true };
    }

    const existing = await this.store.findScanRecord({
      correlationId: message.correlationId,
    });

    if (existing) {
      context.fate = MessageFate.DUPLICATE;
      context.error = new DuplicateCorrelationError(
        message.correlationId,
        'scan_record',
      );
      this.logger.warn(
        `Dropped duplicate message for ${message.correlationId} (first ingested ${existing.createdAt.toISOString()})`,
      );

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { originalScanRecordId: existing.id },
      };
    }

    return { success: true, context, shouldContinue: true };
  }
}
