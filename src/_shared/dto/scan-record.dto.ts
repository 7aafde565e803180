import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsObject,
  IsISO8601,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CORRELATION_ID_PATTERN } from '../../core/validation';
import { PaginationQueryDto } from './pagination.dto';

/**
 * DTO for creating a scan record directly
 */
export class CreateScanRecordRequestDto {
  @ApiProperty({
    description: 'Identifier shared by the scan record and its timestamp token',
    example: 'abc-123',
    minLength: 1,
    maxLength: 128,
    pattern: CORRELATION_ID_PATTERN.source,
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 128)
  @Matches(CORRELATION_ID_PATTERN, {
    message: 'correlationId may only contain letters, digits and . _ : -',
  })
  correlationId!: string;

  @ApiProperty({
    description: 'Scan result content; stored as canonical JSON',
    example: { row: 'X' },
  })
  @IsObject()
  payload!: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'Identifier of the reporting probe',
    example: 'probe-eu-1',
  })
  @IsOptional()
  @IsString()
  @Length(1, 255)
  probe?: string;

  @ApiPropertyOptional({
    description: 'When the probe performed the scan',
    example: '2024-05-01T10:00:00Z',
  })
  @IsOptional()
  @IsISO8601({ strict: true })
  scannedAt?: string;
}

/**
 * Query parameters for listing scan records
 */
export class ListScanRecordsDto extends PaginationQueryDto {
  @ApiPropertyOptional({
    description: 'Case-insensitive substring matched against the payload text',
    example: 'open port',
  })
  @IsOptional()
  @IsString()
  @Length(1, 255)
  q?: string;
}

/**
 * Scan record as returned by the API
 */
export class ScanRecordResponseDto {
  @ApiProperty({ example: '4f1c2a52-3b0e-4f59-9a43-2a8f0a1c7e10' })
  id!: string;

  @ApiProperty({ example: 'abc-123' })
  correlationId!: string;

  @ApiProperty({ example: { row: 'X' } })
  payload!: Record<string, unknown>;

  @ApiProperty({ nullable: true, example: 'probe-eu-1' })
  probe!: string | null;

  @ApiProperty({ nullable: true, type: String, format: 'date-time' })
  scannedAt!: Date | null;

  @ApiProperty({ type: String, format: 'date-time' })
  createdAt!: Date;
}
