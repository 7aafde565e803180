import { Logger } from '@nestjs/common';
import { MessageFate } from '../../domain/enums';
import { TimestampClient } from '../../timestamp';
import {
  IngestionContext,
  PipelineStage,
  StageResult,
  TimestampRequestError,
} from '../types';

/**
 * Stage 3: Timestamp
 * Obtains the TSA token; a failed round trip drops the message with no writes
 */
export class TimestampStage implements PipelineStage {
  name = 'timestamp';
  private readonly logger = new Logger(TimestampStage.name);

  constructor(private readonly client: TimestampClient) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const message = context.message;
    if (!message) {
      return { success: true, context, shouldContinue: true };
    }

    try {
      context.receipt = await this.client.requestTimestamp(message.payloadBytes);
    } catch (error) {
      if (!(error instanceof TimestampRequestError)) {
        throw error;
      }

      context.fate = MessageFate.TIMESTAMP_FAILED;
      context.error = error;
      this.logger.warn(
        `Dropped message for ${message.correlationId}: ${error.message} (${error.reason}, ${error.attempts} attempt(s))`,
      );

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { reason: error.reason, attempts: error.attempts },
      };
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        digest: context.receipt.digest.toString('hex'),
        serialNumber: context.receipt.serialNumber,
        attempts: context.receipt.attempts,
      },
    };
  }
}
