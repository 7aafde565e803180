import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError as ClassValidationError } from 'class-validator';
import { ValidationError } from '../pipeline/types';
import { canonicalJsonBytes, isJsonObject, jsonDepth } from './canonical-json';
import {
  ScanMessage,
  SCAN_MESSAGE_FIELDS,
  ValidatedScanMessage,
} from './scan-message';

export interface PayloadValidatorOptions {
  /**
   * Largest accepted message, in bytes
   */
  maxMessageBytes?: number;

  /**
   * Deepest accepted payload nesting
   */
  maxPayloadDepth?: number;
}

export type ValidationResult =
  | { valid: true; message: ValidatedScanMessage }
  | { valid: false; error: ValidationError };

/**
 * Turns raw probe message bytes into a validated scan message.
 *
 * Input is only ever read with JSON.parse and checked against the
 * ScanMessage schema; nothing in a message is evaluated.
 */
export class PayloadValidator {
  private readonly maxMessageBytes: number;
  private readonly maxPayloadDepth: number;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(options: PayloadValidatorOptions = {}) {
    this.maxMessageBytes = options.maxMessageBytes ?? 1024 * 1024;
    this.maxPayloadDepth = options.maxPayloadDepth ?? 32;
  }

  validate(bytes: Buffer): ValidationResult {
    try {
      return { valid: true, message: this.parse(bytes) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { valid: false, error };
      }
      throw error;
    }
  }

  private parse(bytes: Buffer): ValidatedScanMessage {
    if (bytes.length === 0) {
      throw new ValidationError('Message is empty');
    }
    if (bytes.length > this.maxMessageBytes) {
      throw new ValidationError(
        `Message is ${bytes.length} bytes, limit is ${this.maxMessageBytes}`,
      );
    }

    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch {
      throw new ValidationError('Message is not valid UTF-8');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        `Message is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!isJsonObject(parsed)) {
      throw new ValidationError('Message must be a JSON object');
    }

    const unknownFields = Object.keys(parsed).filter(
      (key) => !SCAN_MESSAGE_FIELDS.has(key),
    );
    if (unknownFields.length > 0) {
      throw new ValidationError(
        `Unknown message fields: ${unknownFields.join(', ')}`,
        unknownFields.map((field) => `${field} is not allowed`),
      );
    }

    const message = plainToInstance(ScanMessage, parsed);
    const errors = validateSync(message, { forbidUnknownValues: true });
    if (errors.length > 0) {
      const issues = this.flattenErrors(errors);
      throw new ValidationError(`Invalid message: ${issues.join('; ')}`, issues);
    }

    const payload = parsed.payload;
    if (!isJsonObject(payload)) {
      throw new ValidationError('payload must be an object');
    }
    if (jsonDepth(payload) > this.maxPayloadDepth) {
      throw new ValidationError(
        `payload nesting exceeds ${this.maxPayloadDepth} levels`,
      );
    }

    return {
      correlationId: message.correlationId,
      payload,
      payloadBytes: canonicalJsonBytes(payload),
      probe: message.probe ?? null,
      scannedAt: message.scannedAt ? new Date(message.scannedAt) : null,
    };
  }

  private flattenErrors(errors: ClassValidationError[]): string[] {
    const issues: string[] = [];
    for (const error of errors) {
      if (error.constraints) {
        issues.push(...Object.values(error.constraints));
      }
      if (error.children && error.children.length > 0) {
        issues.push(...this.flattenErrors(error.children));
      }
    }
    return issues;
  }
}
