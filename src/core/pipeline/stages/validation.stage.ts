import { Logger } from '@nestjs/common';
import { MessageFate } from '../../domain/enums';
import { PayloadValidator } from '../../validation';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 1: Validation
 * Parses the raw bytes into a scan message; invalid messages are dropped
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';
  private readonly logger = new Logger(ValidationStage.name);

  constructor(private readonly validator: PayloadValidator) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const result = this.validator.validate(context.rawMessage);

    if (!result.valid) {
      context.fate = MessageFate.INVALID;
      context.error = result.error;
      this.logger.warn(
        `Dropped invalid message (${context.rawMessage.length} bytes): ${result.error.message}`,
      );

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { issues: result.error.issues },
      };
    }

    context.message = result.message;

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { payloadBytes: result.message.payloadBytes.length },
    };
  }
}
