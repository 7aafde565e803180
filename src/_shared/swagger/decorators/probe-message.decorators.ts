import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for probe message intake
 */
export const ApiSubmitProbeMessage = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Submit a probe message',
      description:
        'Queues the raw request body for the ingestion loop. The body is validated, ' +
        'timestamped and stored asynchronously; invalid messages are dropped.',
    }),
    ApiConsumes('application/json'),
    ApiBody({
      schema: {
        type: 'object',
        required: ['correlationId', 'payload'],
        properties: {
          correlationId: { type: 'string', example: 'abc-123' },
          payload: { type: 'object', example: { row: 'X' } },
          probe: { type: 'string', example: 'probe-eu-1' },
          scannedAt: { type: 'string', format: 'date-time' },
        },
      },
    }),
    ApiResponse({
      status: 202,
      schema: {
        type: 'object',
        properties: {
          accepted: { type: 'boolean', example: true },
          queued: { type: 'number', example: 1 },
        },
      },
    }),
    ApiResponse({ status: 400, description: 'Empty body' }),
    ApiResponse({ status: 413, description: 'Body exceeds the message size limit' }),
    ApiResponse({ status: 503, description: 'Ingestion queue is full' }),
  );
};
