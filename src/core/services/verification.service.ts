import { Logger } from '@nestjs/common';
import { CorrelationStore } from '../interfaces';
import { NotFoundError } from '../pipeline/types';
import { TimestampDetails, TokenVerifier } from '../timestamp';

export interface VerificationResult {
  correlationId: string;
  valid: boolean;
  reason?: string;
  timestamp?: TimestampDetails;
}

/**
 * Verifier: checks a stored token against the stored payload bytes.
 * Only reads from the store, so repeated calls agree.
 */
export class VerificationService {
  private readonly logger = new Logger(VerificationService.name);

  constructor(
    private readonly store: CorrelationStore,
    private readonly verifier: TokenVerifier,
  ) {}

  async verify(correlationId: string): Promise<VerificationResult> {
    const record = await this.store.findScanRecord({ correlationId });
    if (!record) {
      throw new NotFoundError('scan_record', correlationId);
    }

    const token = await this.store.findTimestampToken(correlationId);
    if (!token) {
      throw new NotFoundError('timestamp_token', correlationId);
    }

    const outcome = await this.verifier.verify(token.token, record.payloadBytes);

    if (!outcome.valid) {
      this.logger.warn(`Token for ${correlationId} did not verify: ${outcome.reason}`);
      return {
        correlationId,
        valid: false,
        reason: outcome.reason,
        timestamp: outcome.timestamp,
      };
    }

    return { correlationId, valid: true, timestamp: outcome.timestamp };
  }
}
