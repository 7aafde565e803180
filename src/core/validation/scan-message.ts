import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsObject,
  IsISO8601,
  Length,
  Matches,
} from 'class-validator';

export const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/**
 * Probe message schema.
 *
 * A message is a UTF-8 JSON object with exactly these members; anything
 * else is rejected.
 */
export class ScanMessage {
  @IsString()
  @IsNotEmpty()
  @Length(1, 128)
  @Matches(CORRELATION_ID_PATTERN, {
    message: 'correlationId may only contain letters, digits, ".", "_", ":" and "-"',
  })
  correlationId!: string;

  @IsObject()
  payload!: Record<string, unknown>;

  @IsOptional()
  @IsString()
  @Length(1, 255)
  probe?: string;

  @IsOptional()
  @IsISO8601({ strict: true })
  scannedAt?: string;
}

export const SCAN_MESSAGE_FIELDS: ReadonlySet<string> = new Set([
  'correlationId',
  'payload',
  'probe',
  'scannedAt',
]);

/**
 * A probe message that passed validation
 */
export interface ValidatedScanMessage {
  correlationId: string;
  payload: Record<string, unknown>;

  /**
   * Canonical bytes of `payload`: what gets digested and stored
   */
  payloadBytes: Buffer;

  probe: string | null;
  scannedAt: Date | null;
}
