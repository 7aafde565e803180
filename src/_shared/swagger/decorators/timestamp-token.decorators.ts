import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import {
  TimestampTokenResponseDto,
  VerificationResponseDto,
} from '../../dto';

/**
 * Swagger decorator for storing timestamp tokens
 */
export const ApiCreateTimestampToken = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Store a timestamp token',
      description:
        'Stores an RFC 3161 token for an existing scan record. The token is not checked on write.',
    }),
    ApiResponse({ status: 201, type: TimestampTokenResponseDto }),
    ApiResponse({ status: 400, description: 'Invalid input' }),
    ApiResponse({
      status: 409,
      description: 'A token already exists for the correlation id',
    }),
    ApiResponse({
      status: 422,
      description: 'No scan record exists for the correlation id',
    }),
  );
};

export const ApiGetTimestampToken = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get timestamp token by correlation id' }),
    ApiParam({ name: 'correlationId' }),
    ApiResponse({ status: 200, type: TimestampTokenResponseDto }),
    ApiResponse({ status: 404, description: 'Timestamp token not found' }),
  );
};

export const ApiListTimestampTokens = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List timestamp tokens' }),
    ApiResponse({ status: 200, type: [TimestampTokenResponseDto] }),
  );
};

/**
 * Swagger decorator for token verification
 */
export const ApiVerifyTimestampToken = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Verify a stored timestamp token',
      description:
        'Recomputes the digest of the stored payload and checks the token imprint, signature and signer. ' +
        'A failed check is reported as valid: false, not as an error.',
    }),
    ApiParam({ name: 'correlationId' }),
    ApiResponse({ status: 200, type: VerificationResponseDto }),
    ApiResponse({
      status: 404,
      description: 'No scan record or no token for the correlation id',
    }),
  );
};
