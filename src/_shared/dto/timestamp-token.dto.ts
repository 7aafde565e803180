import {
  IsString,
  IsNotEmpty,
  IsBase64,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CORRELATION_ID_PATTERN } from '../../core/validation';
import { PaginationQueryDto } from './pagination.dto';

/**
 * DTO for storing a timestamp token obtained elsewhere
 */
export class CreateTimestampTokenRequestDto {
  @ApiProperty({
    description: 'Correlation id of an existing scan record',
    example: 'abc-123',
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 128)
  @Matches(CORRELATION_ID_PATTERN)
  correlationId!: string;

  @ApiProperty({
    description: 'DER-encoded RFC 3161 TimeStampToken, base64',
    example: 'MIIG...',
  })
  @IsNotEmpty()
  @IsBase64()
  token!: string;
}

export class ListTimestampTokensDto extends PaginationQueryDto {}

/**
 * Timestamp token as returned by the API
 */
export class TimestampTokenResponseDto {
  @ApiProperty({ example: '0b7e3f9d-8d52-4a51-a3a8-62a1c7b0e6f4' })
  id!: string;

  @ApiProperty({ example: 'abc-123' })
  correlationId!: string;

  @ApiProperty({ description: 'DER token, base64' })
  token!: string;

  @ApiProperty({ type: String, format: 'date-time' })
  createdAt!: Date;
}

export class TimestampDetailsDto {
  @ApiProperty({ type: String, format: 'date-time' })
  genTime!: Date;

  @ApiProperty({ description: 'Token serial number, hex', example: '01' })
  serialNumber!: string;

  @ApiProperty({ example: '1.3.6.1.4.1.99999.1' })
  policy!: string;

  @ApiProperty({ example: 'sha256' })
  hashAlgorithm!: string;
}

/**
 * Outcome of checking a stored token against its scan record
 */
export class VerificationResponseDto {
  @ApiProperty({ example: 'abc-123' })
  correlationId!: string;

  @ApiProperty({ example: true })
  valid!: boolean;

  @ApiPropertyOptional({ example: 'Token imprint does not match the stored payload' })
  reason?: string;

  @ApiPropertyOptional({ type: TimestampDetailsDto })
  timestamp?: TimestampDetailsDto;
}
