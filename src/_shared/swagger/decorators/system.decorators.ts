import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for instance statistics
 */
export const ApiSystemStats = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Instance statistics',
      description: 'Stored record counts and ingestion loop counters',
    }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          scanRecordCount: { type: 'number', example: 42 },
          timestampTokenCount: { type: 'number', example: 42 },
          ingestion: {
            type: 'object',
            properties: {
              state: {
                type: 'string',
                enum: ['idle', 'running', 'stopped', 'failed'],
              },
              iterations: { type: 'number' },
              fates: { type: 'object' },
              queued: { type: 'number' },
            },
          },
        },
      },
    }),
  );
};

export const ApiSystemInfo = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Service information' }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          service: { type: 'string', example: 'scantrail' },
          version: { type: 'string', example: '0.1.0' },
          node: { type: 'string', example: 'v20.11.1' },
          digestAlgorithm: { type: 'string', example: 'sha256' },
          tsaUrl: { type: 'string' },
        },
      },
    }),
  );
};
