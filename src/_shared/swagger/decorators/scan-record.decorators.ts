import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { ScanRecordResponseDto } from '../../dto';

/**
 * Swagger decorator for creating scan records
 */
export const ApiCreateScanRecord = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a scan record',
      description:
        'Stores a scan result without timestamping it. The payload is stored as canonical JSON.',
    }),
    ApiResponse({
      status: 201,
      description: 'Scan record created',
      type: ScanRecordResponseDto,
    }),
    ApiResponse({ status: 400, description: 'Invalid input' }),
    ApiResponse({
      status: 409,
      description: 'A scan record already exists for the correlation id',
    }),
  );
};

/**
 * Swagger decorator for scan record lookups
 */
export const ApiGetScanRecord = (options?: { byCorrelationId?: boolean }) => {
  const param = options?.byCorrelationId ? 'correlationId' : 'id';

  return applyDecorators(
    ApiOperation({
      summary: options?.byCorrelationId
        ? 'Get scan record by correlation id'
        : 'Get scan record by id',
    }),
    ApiParam({
      name: param,
      description: options?.byCorrelationId
        ? 'Correlation id supplied by the probe'
        : 'Surrogate id assigned at persistence',
    }),
    ApiResponse({ status: 200, type: ScanRecordResponseDto }),
    ApiResponse({ status: 404, description: 'Scan record not found' }),
  );
};

/**
 * Swagger decorator for listing scan records
 */
export const ApiListScanRecords = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List scan records',
      description:
        'Lists scan records in ingestion order, optionally filtered by a substring of the payload',
    }),
    ApiResponse({ status: 200, type: [ScanRecordResponseDto] }),
  );
};
